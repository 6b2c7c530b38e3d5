export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
  details?: Record<string, unknown>;
}

function readStringField(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

export function serializeError(error: unknown, depth = 0): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };

    const code = readStringField(error, 'code');
    if (code) {
      serialized.code = code;
    }

    if (error.cause !== undefined && depth < 5) {
      serialized.cause = serializeError(error.cause, depth + 1);
    }

    const details: unknown = Reflect.get(error, 'details');
    if (details && typeof details === 'object' && !Array.isArray(details)) {
      serialized.details = { ...details };
    }

    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  if (error && typeof error === 'object') {
    const message = readStringField(error, 'message') ?? readStringField(error, 'error');
    return {
      message: message ?? JSON.stringify(error),
      name: readStringField(error, 'name'),
      code: readStringField(error, 'code'),
    };
  }

  return { message: String(error) };
}

/**
 * Database Connection Factory for User Service
 * Owns the postgres.js pool and the drizzle instance built on it
 */

import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { serializeError } from '@lastcup/platform-core';
import * as notificationSchema from './schemas/notification-schema';
import { getLogger } from '../../config/logging';

const logger = getLogger('database-connection-factory');

export type DatabaseSchema = typeof notificationSchema;
export type DatabaseConnection = PostgresJsDatabase<DatabaseSchema>;
export type SQLConnection = ReturnType<typeof postgres>;

export interface DatabaseOptions {
  url?: string;
  poolMax: number;
  statementTimeoutMs?: number;
}

export class DatabaseConnectionFactory {
  private sqlConnection: SQLConnection | null = null;
  private dbConnection: DatabaseConnection | null = null;

  private constructor(private readonly options: DatabaseOptions) {}

  public static configure(options: DatabaseOptions): DatabaseConnectionFactory {
    return new DatabaseConnectionFactory(options);
  }

  private static getSslConfig(connectionString: string): false | 'require' {
    if (process.env.DATABASE_SSL === 'false') return false;
    try {
      const url = new URL(connectionString);
      if (url.hostname === 'localhost' || url.hostname === '127.0.0.1') return false;
      if (url.searchParams.get('sslmode') === 'disable') return false;
    } catch {
      return 'require';
    }
    return 'require';
  }

  public getSQLConnection(): SQLConnection {
    if (!this.sqlConnection) {
      const connectionString = this.options.url;

      if (!connectionString) {
        logger.error('Database URL not configured', { requiredEnvVar: 'USER_DATABASE_URL or DATABASE_URL' });
        throw new Error('USER_DATABASE_URL or DATABASE_URL environment variable is required for user-service');
      }

      this.sqlConnection = postgres(connectionString, {
        max: this.options.poolMax,
        idle_timeout: 300,
        connect_timeout: 10,
        ssl: DatabaseConnectionFactory.getSslConfig(connectionString),
        onnotice: () => {},
        connection: {
          statement_timeout: this.options.statementTimeoutMs ?? 30000,
        },
      });

      logger.debug('Database connection pool created', { poolMax: this.options.poolMax });
    }
    return this.sqlConnection;
  }

  public getDatabase(): DatabaseConnection {
    if (!this.dbConnection) {
      this.dbConnection = drizzle(this.getSQLConnection(), {
        schema: notificationSchema,
        logger: false,
      });

      logger.debug('Drizzle ORM initialized');
    }
    return this.dbConnection;
  }

  public createDrizzleRepository<T>(RepositoryClass: new (db: DatabaseConnection) => T): T {
    return new RepositoryClass(this.getDatabase());
  }

  public async close(): Promise<void> {
    if (this.sqlConnection) {
      await this.sqlConnection.end();
    }
    this.sqlConnection = null;
    this.dbConnection = null;
    logger.info('Connections closed');
  }

  public async healthCheck(): Promise<{ status: 'healthy' | 'unhealthy'; latencyMs: number }> {
    const startTime = Date.now();
    try {
      const sql = this.getSQLConnection();
      await sql`SELECT 1`;
      return { status: 'healthy', latencyMs: Date.now() - startTime };
    } catch (error) {
      logger.error('Health check failed', { error: serializeError(error) });
      return { status: 'unhealthy', latencyMs: Date.now() - startTime };
    }
  }
}

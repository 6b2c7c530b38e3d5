export interface IPushTransport {
  /**
   * Deliver one notification to every token. Rejects with a
   * `PushTransportError` when the transport could not take the message.
   */
  sendToTokens(tokens: readonly string[], title: string, body: string): Promise<void>;
}

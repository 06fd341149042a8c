/** Delivers a text message to a user; resolves false when delivery failed */
export interface Notifier {
  send(userId: string, text: string): Promise<boolean>;
}

export interface InboundMessage {
  /** WhatsApp ID of the sender */
  userId: string;
  /** Profile name, when the platform provides it */
  displayName?: string;
  text: string;
}

/** Entry point used by the webhook once a payload has been parsed */
export interface InboundHandler {
  handle(message: InboundMessage): Promise<string>;
  handleUnsupported(userId: string, messageType: string): Promise<void>;
}

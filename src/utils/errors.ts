export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ConfigError extends AppError {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_ERROR', 500);
    this.name = 'ConfigError';
  }
}

export class WebhookVerificationError extends AppError {
  constructor(message: string = 'Invalid webhook signature') {
    super(message, 'WEBHOOK_VERIFICATION_ERROR', 401);
    this.name = 'WebhookVerificationError';
  }
}

export class RateLimitError extends AppError {
  constructor(public clientIp: string) {
    super('Too many requests', 'RATE_LIMIT_EXCEEDED', 429);
    this.name = 'RateLimitError';
  }
}

export class DeliveryError extends AppError {
  constructor(
    message: string,
    public status?: number,
    public retryable: boolean = true
  ) {
    super(message, 'DELIVERY_ERROR', 502);
    this.name = 'DeliveryError';
  }
}

export class AssistantDeadlineError extends AppError {
  constructor(public timeoutMs: number) {
    super(`Assistant did not answer within ${timeoutMs}ms`, 'ASSISTANT_DEADLINE', 504);
    this.name = 'AssistantDeadlineError';
  }
}

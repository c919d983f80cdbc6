import { BaseError } from '@notifier/shared/Types/errors.js';

/**
 * Base error for all notifier errors
 */
export class NotifierError extends BaseError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
    this.name = 'NotifierError';
  }
}

/**
 * The provider rejected our credentials. Terminal for the refresh driver.
 */
export class ProviderAuthError extends NotifierError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROVIDER_AUTH_ERROR', details);
    this.name = 'ProviderAuthError';
  }
}

/**
 * Network failure, timeout, throttling or server error while fetching.
 * The refresh tick is skipped and retried on the next one.
 */
export class TransientFetchError extends NotifierError {
  constructor(message: string, details?: unknown) {
    super(message, 'TRANSIENT_FETCH_ERROR', details);
    this.name = 'TransientFetchError';
  }
}

/**
 * A chat message was not accepted by the messaging gateway.
 */
export class DeliveryError extends NotifierError {
  constructor(
    message: string,
    public chatId: string,
    details?: unknown
  ) {
    super(message, 'DELIVERY_ERROR', details);
    this.name = 'DeliveryError';
  }
}

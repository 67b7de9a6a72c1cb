/**
 * Error Types
 *
 * Typed error classes, one per failure category. Callers branch on the class
 * (or `code`) to decide whether a failure is reported to the operator,
 * logged and skipped, or aborts the current tick.
 */

/**
 * Error codes for classification.
 */
export type BotErrorCode =
  | 'CONFIGURATION_INVALID'
  | 'EVENT_NOT_FOUND'
  | 'CHANNEL_NOT_SET'
  | 'PERSISTENCE_FAILED'
  | 'DELIVERY_FAILED';

/**
 * Base error class.
 */
export class BotError extends Error {
  constructor(
    message: string,
    public readonly code: BotErrorCode
  ) {
    super(message);
    this.name = 'BotError';
  }
}

/**
 * Invalid operator input (weekday, time, offsets, duration, name).
 * Rejected at the command boundary; never reaches stored state.
 */
export class ConfigurationError extends BotError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_INVALID');
    this.name = 'ConfigurationError';
  }
}

/**
 * A command referenced an event that the community does not have.
 */
export class EventNotFoundError extends BotError {
  constructor(public readonly eventName: string) {
    super(`Event "${eventName}" not found.`, 'EVENT_NOT_FOUND');
    this.name = 'EventNotFoundError';
  }
}

/**
 * The community has no announce channel configured.
 */
export class ChannelNotSetError extends BotError {
  constructor(public readonly communityId: string) {
    super('Announce channel not set. Use /set_announce_channel.', 'CHANNEL_NOT_SET');
    this.name = 'ChannelNotSetError';
  }
}

/**
 * State could not be written. The mutation that triggered the write is not
 * durable and has been rolled back in memory.
 */
export class PersistenceError extends BotError {
  constructor(
    public readonly documentKey: string,
    cause: unknown
  ) {
    super(
      `Failed to persist ${documentKey}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'PERSISTENCE_FAILED'
    );
    this.name = 'PersistenceError';
    this.cause = cause;
  }
}

/**
 * The chat platform rejected or could not receive a message.
 * Not retried.
 */
export class DeliveryError extends BotError {
  constructor(
    public readonly channelId: string,
    message: string
  ) {
    super(message, 'DELIVERY_FAILED');
    this.name = 'DeliveryError';
  }
}

/**
 * Render an unknown thrown value for a log field.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

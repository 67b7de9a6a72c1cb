import type { CircuitBreakerStats } from '../core/circuit-breaker.js';
import type { DueReminder } from '../schedule/types.js';

export type CircuitStats = CircuitBreakerStats;

/**
 * Result of sending a message.
 */
export interface SendResult {
  /** Whether the message was sent successfully */
  success: boolean;
  /** Platform message ID */
  messageId?: string;
  /** Failure reason when success is false */
  error?: string;
}

/**
 * Options for sending messages.
 */
export interface SendOptions {
  /** Role whose mention in the text should actually ping */
  mentionRoleId?: string | null;
}

/**
 * Outbound chat channel.
 */
export interface Channel {
  /** Channel name (e.g., "discord") */
  readonly name: string;

  /**
   * Check if the channel is configured and available.
   * Returns false if required credentials are missing.
   */
  isAvailable(): boolean;

  /**
   * Send a text message to a channel. Never throws; failures are reported
   * in the result.
   */
  sendMessage(channelId: string, text: string, options?: SendOptions): Promise<SendResult>;

  start?(): Promise<void>;

  stop?(): Promise<void>;

  /** Breaker state of one target channel */
  getCircuitStats?(channelId: string): CircuitStats;
}

/**
 * Messaging collaborator of the poll loop.
 */
export interface ReminderSender {
  sendReminder(reminder: DueReminder): Promise<SendResult>;

  /** Free-form text, used for test pings. */
  sendText(channelId: string, text: string, options?: SendOptions): Promise<SendResult>;
}

import type { MessagePayload, MetricMessage } from '../serialization/types.js';

/** Invoked exactly once per submitted message; `null` on success. */
export type CompletionCallback = (error: Error | null) => void;

/**
 * Send sink for metric messages. `send` must not wait for acknowledgment;
 * it may throw synchronously to refuse a message.
 */
export interface BrokerClient<T extends MessagePayload = MessagePayload> {
  send(message: MetricMessage<T>, callback: CompletionCallback): void;
}

import type { BrokerClient, CompletionCallback } from '../../broker/types.js';
import type { MessagePayload, MetricMessage } from '../../serialization/types.js';

export interface RecordedSend {
  message: MetricMessage;
  callback: CompletionCallback;
}

/**
 * In-process broker client: records submissions and leaves completion to
 * the test. `rejectWhen` refuses matching messages synchronously.
 */
export class RecordingBrokerClient implements BrokerClient {
  readonly sent: RecordedSend[] = [];
  rejectWhen?: (message: MetricMessage<MessagePayload>) => Error | undefined;

  send(message: MetricMessage, callback: CompletionCallback): void {
    const rejection = this.rejectWhen?.(message);
    if (rejection) throw rejection;
    this.sent.push({ message, callback });
  }

  keys(): string[] {
    return this.sent.map(({ message }) => String(message.key));
  }

  completeAll(error: Error | null = null): void {
    for (const { callback } of this.sent) callback(error);
  }
}

import type { SignalCursor } from '../pltx/cursor.js';
import type { PltxError } from '../pltx/errors.js';
import { errorMessage } from '../pltx/errors.js';
import type { PltxLogger, Sample } from '../pltx/types.js';

/** One per-sample message on a stream; `desc` is reserved and always empty. */
export interface StreamMessage {
    timestamp: number;
    value: number;
    desc: string;
    seq: number;
    end_flag: boolean;
}

/**
 * Delivery side of a stream. `send` settles once the channel accepted the
 * message and rejects if the channel went away.
 */
export interface StreamChannel {
    readonly closed: boolean;
    send(message: StreamMessage): Promise<void>;
    /** Signals failure through the channel's error path, then closes it. */
    fail(error: PltxError): Promise<void>;
    close(): Promise<void>;
}

export type SessionOutcome = 'completed' | 'failed' | 'cancelled';

/**
 * Drains one cursor into one channel. Ends with exactly one `end_flag`
 * message on success and none on failure.
 */
export class StreamingSession {
    constructor(
        private readonly cursor: SignalCursor,
        private readonly channel: StreamChannel,
        private readonly logger: PltxLogger | null = null
    ) { }

    async run(): Promise<SessionOutcome> {
        const name = this.cursor.signalName;
        let last: Sample | null = null;
        this.logger?.info?.(`Streaming started: ${name}`);

        try {
            for (;;) {
                if (this.channel.closed) {
                    await this.cursor.close();
                    this.logger?.info?.(`Streaming cancelled: ${name} after ${this.cursor.seq} samples`);
                    return 'cancelled';
                }

                const step = await this.cursor.next();
                if (step.kind === 'sample') {
                    await this.channel.send({
                        timestamp: step.sample.timestamp,
                        value: step.sample.value,
                        desc: '',
                        seq: step.seq,
                        end_flag: false,
                    });
                    last = step.sample;
                    continue;
                }

                if (step.kind === 'end') {
                    await this.channel.send({
                        timestamp: last?.timestamp ?? 0,
                        value: last?.value ?? 0,
                        desc: '',
                        seq: step.seq,
                        end_flag: true,
                    });
                    await this.channel.close();
                    this.logger?.info?.(`Streaming finished: ${name} (${step.seq} samples)`);
                    return 'completed';
                }

                this.logger?.error?.(`Streaming failed: ${name} at seq ${step.seq}: ${step.error.message}`);
                await this.channel.fail(step.error);
                return 'failed';
            }
        } catch (e) {
            await this.cursor.close();
            if (this.channel.closed) {
                this.logger?.info?.(`Streaming cancelled: ${name} (${errorMessage(e)})`);
                return 'cancelled';
            }
            throw e;
        }
    }
}

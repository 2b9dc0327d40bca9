export type SendFn = (chatId: number | string, text: string) => Promise<unknown>;

interface QueuedMessage {
  chatId: number | string;
  text: string;
}

const MAX_QUEUE_LENGTH = 2000;
const DEFAULT_INTERVAL_MS = 2000;

/**
 * Paced outgoing queue: one message per tick so broadcasts don't hit Telegram rate limits.
 */
export class MessageQueue {
  private readonly queue: QueuedMessage[] = [];
  private isProcessing = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly send: SendFn,
    private readonly intervalMs: number = DEFAULT_INTERVAL_MS
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.processNext();
    }, this.intervalMs);
    console.log(`[Queue] Message queue processor started (interval: ${this.intervalMs / 1000} seconds)`);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  /** False when the queue is full and the message was dropped */
  enqueue(chatId: number | string, text: string): boolean {
    if (this.queue.length >= MAX_QUEUE_LENGTH) {
      console.warn(`[Queue] Queue full (max ${MAX_QUEUE_LENGTH}). Message to chat ${chatId} dropped.`);
      return false;
    }
    this.queue.push({ chatId, text });
    if (process.env.LOG_LEVEL === 'debug') {
      console.log(`[Queue] Message added. Queue length: ${this.queue.length}`);
    }
    return true;
  }

  get length(): number {
    return this.queue.length;
  }

  /** Send the oldest message. A failed send is logged and dropped. */
  async processNext(): Promise<boolean> {
    if (this.isProcessing || this.queue.length === 0) return false;

    this.isProcessing = true;
    const message = this.queue.shift();
    let sent = false;
    if (message) {
      try {
        await this.send(message.chatId, message.text);
        sent = true;
        if (process.env.LOG_LEVEL === 'debug') {
          console.log(`[Queue] Message sent to chat ${message.chatId}. Remaining in queue: ${this.queue.length}`);
        }
      } catch (error) {
        console.error(`[Queue] Error sending message to chat ${message.chatId}:`, error);
      }
    }
    this.isProcessing = false;
    return sent;
  }
}

import type { Logger } from "../lib/logger.js";

export type AlbumProcessor = (fileIds: string[]) => Promise<void>;

interface AlbumEntry {
  userId: number;
  fileIds: string[];
  process: AlbumProcessor;
  timer: NodeJS.Timeout | null;
}

/**
 * Collects the photos of one media group until no new photo has arrived
 * for `quietMs`, then hands them to the processor as one batch.
 */
export class AlbumBuffer {
  private readonly entries = new Map<string, AlbumEntry>();

  constructor(
    private readonly quietMs: number,
    private readonly logger: Logger
  ) {}

  add(userId: number, mediaGroupId: string, fileId: string, process: AlbumProcessor): void {
    const key = `${userId}:${mediaGroupId}`;
    const entry = this.entries.get(key) ?? { userId, fileIds: [], process, timer: null };

    entry.fileIds.push(fileId);
    entry.process = process;
    if (entry.timer) {
      clearTimeout(entry.timer);
    }
    entry.timer = setTimeout(() => {
      void this.flush(key);
    }, this.quietMs);

    this.entries.set(key, entry);
  }

  /** Cancels the user's pending timers; buffered photos are processed now or dropped. */
  async drain(userId: number, processEntries: boolean): Promise<void> {
    const keys = [...this.entries.keys()].filter((key) => this.entries.get(key)?.userId === userId);

    for (const key of keys) {
      if (processEntries) {
        await this.flush(key);
      } else {
        this.take(key);
      }
    }
  }

  pending(userId: number): number {
    let total = 0;
    for (const entry of this.entries.values()) {
      if (entry.userId === userId) total += entry.fileIds.length;
    }
    return total;
  }

  clear(): void {
    for (const key of [...this.entries.keys()]) {
      this.take(key);
    }
  }

  private take(key: string): AlbumEntry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    this.entries.delete(key);
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
    return entry;
  }

  private async flush(key: string): Promise<void> {
    const entry = this.take(key);
    if (!entry) {
      return;
    }

    try {
      await entry.process(entry.fileIds);
    } catch (error) {
      this.logger.error({ err: error, userId: entry.userId }, "Album processing failed");
    }
  }
}

import { PIT_KEEP_ALIVE } from "./api-client.js";
import { describeError } from "./errors.js";
import { logger } from "./logger.js";
import type { SearchBackend, SearchRequestBody } from "./types.js";

export interface SnapshotSession {
  id: string;
  keepAlive: string;
}

/**
 * Owns the point-in-time handle of one command invocation.
 * State machine: closed -> open -> closed.
 */
export class SnapshotManager {
  private session: SnapshotSession | null = null;
  private index: string | null = null;

  constructor(
    private readonly backend: SearchBackend,
    private readonly keepAlive: string = PIT_KEEP_ALIVE,
  ) {}

  get current(): SnapshotSession | null {
    return this.session;
  }

  get isOpen(): boolean {
    return this.session !== null;
  }

  async open(index: string): Promise<SnapshotSession> {
    if (this.session) {
      throw new Error(`A point in time is already open on ${this.index ?? index}`);
    }
    const id = await this.backend.openPointInTime(index, this.keepAlive);
    this.index = index;
    this.session = { id, keepAlive: this.keepAlive };
    logger.debug("Opened point in time", { index });
    return this.session;
  }

  /** Replaces the snapshot with a fresh one so the keep-alive never lapses. */
  async refresh(): Promise<SnapshotSession> {
    const index = this.index;
    if (index === null) {
      throw new Error("Cannot refresh a point in time that was never opened");
    }
    await this.close();
    return this.open(index);
  }

  /** Idempotent. Failures are reported and never thrown. */
  async close(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = null;

    try {
      await this.backend.closePointInTime(session.id);
      logger.debug("Closed point in time");
    } catch (error: unknown) {
      logger.warn(`Failed to close point in time: ${describeError(error)}`);
    }
  }

  /** Adds the `pit` reference to a request body when a snapshot is open. */
  attach(body: SearchRequestBody): SearchRequestBody {
    if (!this.session) return body;
    return { ...body, pit: { id: this.session.id, keep_alive: this.session.keepAlive } };
  }
}

/**
 * Scoped acquisition: opens the snapshot when `needed`, runs `fn`, and
 * releases the snapshot on every exit path.
 */
export async function withSnapshot<T>(
  manager: SnapshotManager,
  index: string,
  needed: boolean,
  fn: (manager: SnapshotManager) => Promise<T>,
): Promise<T> {
  if (needed) {
    await manager.open(index);
  }
  try {
    return await fn(manager);
  } finally {
    await manager.close();
  }
}

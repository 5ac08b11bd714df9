/**
 * @fileoverview Session memory with sticky primary → local degradation
 *
 * Turns go to the primary store while it is healthy. The first primary
 * failure for a session moves that session to the local store for the rest
 * of the process; it never moves back. Appends never throw: a failed primary
 * write comes back as a StorageDegraded outcome and the turn lands locally.
 *
 * To keep the user/assistant pairing intact across a downgrade, the turns
 * last seen in the primary store are remembered per session and copied into
 * the local store before its first local write. Only the most recently used
 * sessions keep a snapshot; every question reads history first, which
 * refreshes the snapshot of the session being answered.
 */

import type { NewTurn, SessionSummary, StorageOrigin, Turn } from '../types.js';
import type { SessionStore, StoredSessionSummary } from '../storage/types.js';
import { MemorySessionStore } from '../storage/memory_store.js';
import { safeAsync, type Result } from '../core/result.js';
import { withTimeout } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';

const DEFAULT_PREVIEW_LENGTH = 50;
const DEFAULT_STORAGE_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_SNAPSHOT_SESSIONS = 500;

// ============================================================================
// OUTCOMES
// ============================================================================

/**
 * Informational: a primary write failed and the session now lives locally.
 */
export interface StorageDegraded {
  kind: 'storage_degraded';
  sessionId: string;
  reason: string;
  at: string;
}

export type AppendOutcome =
  | { tier: 'primary'; turn: Turn }
  | { tier: 'local'; turn: Turn; degraded?: StorageDegraded };

export interface SessionMemoryOptions {
  /** Omit to run on the local store only. */
  primary?: SessionStore | null;
  local?: MemorySessionStore;
  onDegraded?: (event: StorageDegraded) => void;
  previewLength?: number;
  storageTimeoutMs?: number;
  /** Sessions whose primary turns are remembered for a downgrade. */
  maxSnapshotSessions?: number;
  now?: () => string;
}

// ============================================================================
// SESSION MEMORY
// ============================================================================

export class SessionMemory {
  private readonly primary: SessionStore | null;
  private readonly local: MemorySessionStore;
  private readonly onDegraded?: (event: StorageDegraded) => void;
  private readonly previewLength: number;
  private readonly storageTimeoutMs: number;
  private readonly maxSnapshotSessions: number;
  private readonly now: () => string;
  private readonly downgraded = new Set<string>();
  private readonly primarySnapshots = new Map<string, Turn[]>();

  constructor(options: SessionMemoryOptions = {}) {
    this.primary = options.primary ?? null;
    this.local = options.local ?? new MemorySessionStore();
    this.onDegraded = options.onDegraded;
    this.previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH;
    this.storageTimeoutMs = options.storageTimeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
    this.maxSnapshotSessions = Math.max(1, options.maxSnapshotSessions ?? DEFAULT_MAX_SNAPSHOT_SESSIONS);
    this.now = options.now ?? (() => new Date().toISOString());
  }

  /**
   * Which tier currently owns the session.
   */
  origin(sessionId: string): StorageOrigin {
    if (!this.primary || this.downgraded.has(sessionId)) return 'local';
    return 'primary';
  }

  hasPrimary(): boolean {
    return this.primary !== null;
  }

  /** Sessions that currently hold a primary snapshot, least recently used first. */
  snapshotSessions(): string[] {
    return [...this.primarySnapshots.keys()];
  }

  async append(sessionId: string, input: NewTurn): Promise<AppendOutcome> {
    const turn: Turn = { ...input, createdAt: this.now() };

    const primary = this.origin(sessionId) === 'primary' ? this.primary : null;
    if (!primary) {
      await this.local.appendTurn(sessionId, turn);
      return { tier: 'local', turn };
    }

    const written = await this.callPrimary('append', () => primary.appendTurn(sessionId, turn));
    if (written.ok) {
      this.rememberPrimaryTurns(sessionId, [turn]);
      return { tier: 'primary', turn };
    }

    const degraded: StorageDegraded = {
      kind: 'storage_degraded',
      sessionId,
      reason: getErrorMessage(written.error),
      at: turn.createdAt,
    };
    this.downgraded.add(sessionId);
    const snapshot = this.primarySnapshots.get(sessionId) ?? [];
    this.primarySnapshots.delete(sessionId);
    await this.local.seedSession(sessionId, snapshot);
    await this.local.appendTurn(sessionId, turn);

    logWarning('Primary session store failed; session continues on local store', {
      sessionId,
      carriedTurns: snapshot.length,
      error: degraded.reason,
    });
    this.notifyDegraded(degraded);
    return { tier: 'local', turn, degraded };
  }

  /**
   * Ordered turns of a session. A failed primary read is answered from the
   * local store without moving the session.
   */
  async history(sessionId: string): Promise<Turn[]> {
    const primary = this.origin(sessionId) === 'primary' ? this.primary : null;
    if (!primary) return this.local.listTurns(sessionId);

    const read = await this.callPrimary('read', () => primary.listTurns(sessionId));
    if (read.ok) {
      this.storeSnapshot(sessionId, [...read.value]);
      return read.value;
    }
    logWarning('Primary history read failed; answering from local store', {
      sessionId,
      error: getErrorMessage(read.error),
    });
    return this.local.listTurns(sessionId);
  }

  /**
   * Remove a session from both tiers. Deleting an unknown session returns false.
   */
  async delete(sessionId: string): Promise<boolean> {
    this.primarySnapshots.delete(sessionId);
    const removedLocally = await this.local.deleteSession(sessionId);
    const primary = this.primary;
    if (!primary) return removedLocally;

    const removed = await this.callPrimary('delete', () => primary.deleteSession(sessionId));
    if (!removed.ok) {
      logWarning('Primary session delete failed', { sessionId, error: getErrorMessage(removed.error) });
      return removedLocally;
    }
    return removed.value || removedLocally;
  }

  /**
   * Sessions from both tiers, most recent first. The primary entry wins when
   * a session id appears in both.
   */
  async listSessions(): Promise<SessionSummary[]> {
    const merged = new Map<string, SessionSummary>();

    for (const summary of await this.local.listSessionSummaries()) {
      merged.set(summary.sessionId, this.toSummary(summary, 'local'));
    }

    const primary = this.primary;
    if (primary) {
      const listed = await this.callPrimary('list', () => primary.listSessionSummaries());
      if (listed.ok) {
        for (const summary of listed.value) {
          merged.set(summary.sessionId, this.toSummary(summary, 'primary'));
        }
      } else {
        logWarning('Primary session listing failed; listing local sessions only', {
          error: getErrorMessage(listed.error),
        });
      }
    }

    return [...merged.values()].sort((a, b) => compareDesc(a.lastActivityAt, b.lastActivityAt));
  }

  async close(): Promise<void> {
    await this.primary?.close?.();
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async callPrimary<T>(operation: string, work: () => Promise<T>): Promise<Result<T, Error>> {
    const result = await safeAsync(() =>
      withTimeout(work(), this.storageTimeoutMs, { context: `primary session store ${operation}` })
    );
    if (!result.ok) {
      logDebug('Primary session store call failed', { operation, error: result.error.message });
    }
    return result;
  }

  private notifyDegraded(event: StorageDegraded): void {
    if (!this.onDegraded) return;
    try {
      this.onDegraded(event);
    } catch (error) {
      logWarning('onDegraded hook threw', { sessionId: event.sessionId, error: getErrorMessage(error) });
    }
  }

  private rememberPrimaryTurns(sessionId: string, turns: Turn[]): void {
    const snapshot = this.primarySnapshots.get(sessionId) ?? [];
    snapshot.push(...turns);
    this.storeSnapshot(sessionId, snapshot);
  }

  /** Insert as most recently used and evict the least recently used. */
  private storeSnapshot(sessionId: string, turns: Turn[]): void {
    this.primarySnapshots.delete(sessionId);
    this.primarySnapshots.set(sessionId, turns);
    while (this.primarySnapshots.size > this.maxSnapshotSessions) {
      const oldest = this.primarySnapshots.keys().next();
      if (oldest.done) break;
      this.primarySnapshots.delete(oldest.value);
    }
  }

  private toSummary(summary: StoredSessionSummary, origin: StorageOrigin): SessionSummary {
    return {
      sessionId: summary.sessionId,
      preview: truncatePreview(summary.firstQuestion, this.previewLength),
      lastActivityAt: summary.lastActivityAt,
      origin,
    };
  }
}

export function truncatePreview(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.slice(0, maxLength);
  return `${text.slice(0, maxLength - 3)}...`;
}

function compareDesc(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? 1 : -1;
}

import type { CommitInfo } from '../application/ports/revision-loader.js';

export interface ReportRunContext {
  readonly previous?: string;
  readonly next?: string;
  readonly deckPath?: string;
  readonly commit?: CommitInfo;
  readonly startedAt?: string;
  readonly durationMs?: number;
}

export interface CreateRunContextOptions {
  readonly previous?: string;
  readonly next?: string;
  readonly deckPath?: string;
  readonly commit?: CommitInfo;
  readonly startedAt?: Date | string;
  readonly durationMs?: number;
}

/**
 * Normalises metadata about a run into the context shown in report headers.
 *
 * @param options - Labels, commit details and timing captured during the run.
 * @returns The run context with an ISO timestamp.
 */
export function createRunContext(options: CreateRunContextOptions): ReportRunContext {
  const { previous, next, deckPath, commit, startedAt, durationMs } = options;
  const timestamp = typeof startedAt === 'string' ? startedAt : startedAt?.toISOString();

  return {
    ...(previous ? { previous } : {}),
    ...(next ? { next } : {}),
    ...(deckPath ? { deckPath } : {}),
    ...(commit === undefined ? {} : { commit }),
    ...(timestamp ? { startedAt: timestamp } : {}),
    ...(durationMs === undefined ? {} : { durationMs }),
  } satisfies ReportRunContext;
}

/**
 * Describes what was compared, e.g. `a1b2c3d → e4f5a6b`.
 *
 * @param context - The run context to describe.
 * @returns The comparison label, or `undefined` when neither side is known.
 */
export function describeRunComparison(context: ReportRunContext | undefined): string | undefined {
  if (context === undefined) {
    return undefined;
  }

  const { previous, next } = context;
  if (previous && next) {
    return `${previous} → ${next}`;
  }

  return next ?? previous;
}

/**
 * Formats the run start as a compact UTC timestamp.
 *
 * @param context - The run context containing the start timestamp.
 * @returns `YYYY-MM-DD HH:MM UTC`, or `undefined` when missing or invalid.
 */
export function formatRunTimestamp(context: ReportRunContext | undefined): string | undefined {
  if (!context?.startedAt) {
    return undefined;
  }

  const timestamp = Date.parse(context.startedAt);
  if (!Number.isFinite(timestamp)) {
    return undefined;
  }

  const iso = new Date(timestamp).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

/**
 * Formats the run duration in milliseconds below one second and seconds above.
 *
 * @param context - The run context containing the duration.
 * @returns The formatted duration, or `undefined` when missing or negative.
 */
export function formatRunDuration(context: ReportRunContext | undefined): string | undefined {
  const duration = context?.durationMs;
  if (duration === undefined || !Number.isFinite(duration) || duration < 0) {
    return undefined;
  }

  if (duration >= 1000) {
    const seconds = duration / 1000;
    return `${seconds.toFixed(seconds >= 10 ? 0 : 1)}s`;
  }

  return `${String(Math.round(duration))}ms`;
}

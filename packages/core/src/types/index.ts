/**
 * @schoolbell/core - Domain types
 * Children, lessons, tasks and the immutable snapshot published by the coordinator.
 */

// ---------------------------------------------------------------------------
// Child
// ---------------------------------------------------------------------------

/** A tracked pupil. Discovered once at setup; immutable for the session. */
export interface Child {
  id: string;
  name: string;
  /** IANA zone used for day-boundary decisions (e.g. "Europe/London"). */
  timezone: string;
}

// ---------------------------------------------------------------------------
// Calendar
// ---------------------------------------------------------------------------

/** One lesson / timetable period. Invariant: start < end. */
export interface SchoolEvent {
  id?: string;
  childId: string;
  start: Date;
  end: Date;
  subject: string;
  location: string | null;
  description: string | null;
  /** Teaching group the lesson belongs to, when the school exposes it. */
  guild: string | null;
  attendees: string[];
}

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

export interface SchoolTask {
  /** Stable across polls. */
  id: string;
  childId: string;
  title: string;
  description: string;
  dueAt: Date | null;
  /** Upstream data may place this after dueAt. */
  setAt: Date | null;
  subject: string;
  taskType: string;
  setter: string;
  completionStatus: string;
  completed: boolean;
}

/** Window handed to the data source when requesting tasks. */
export interface TaskWindow {
  from: Date;
  to: Date;
  /** Overdue tasks are wanted regardless of `from`. */
  includeOverdue: boolean;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export interface ChildSnapshot {
  child: Child;
  /** Sorted ascending by start. */
  events: readonly SchoolEvent[];
  tasks: readonly SchoolTask[];
}

/** Immutable point-in-time aggregate of every child's events and tasks. */
export interface Snapshot {
  producedAt: Date;
  children: ReadonlyMap<string, ChildSnapshot>;
}

/** Either no cycle has succeeded yet, or the last fully published snapshot. */
export type SnapshotState =
  | { status: 'empty' }
  | { status: 'ready'; snapshot: Snapshot };

export const EMPTY_SNAPSHOT_STATE: SnapshotState = Object.freeze({ status: 'empty' });

/**
 * Build a frozen snapshot. Events are sorted by start; the map and every
 * nested array are frozen so readers can share it freely.
 */
export function createSnapshot(producedAt: Date, entries: ChildSnapshot[]): Snapshot {
  const children = new Map<string, ChildSnapshot>();

  for (const entry of entries) {
    const events = [...entry.events].sort((a, b) => a.start.getTime() - b.start.getTime());
    children.set(
      entry.child.id,
      Object.freeze({
        child: Object.freeze({ ...entry.child }),
        events: Object.freeze(events.map((e) => Object.freeze(e))),
        tasks: Object.freeze(entry.tasks.map((t) => Object.freeze(t))),
      }),
    );
  }

  return Object.freeze({ producedAt, children });
}

/**
 * @schoolbell/views - View shapes
 *
 * A derived view is a small `state` + `attributes` record recomputed on every
 * read from the current snapshot and the wall-clock instant of the read.
 */

import type { ChildSnapshot, SchoolEvent, SchoolTask, Snapshot } from '@schoolbell/core';

// ---------------------------------------------------------------------------
// Projection input
// ---------------------------------------------------------------------------

export interface ProjectionContext {
  snapshot: Snapshot;
  childId: string;
  now: Date;
  /** IANA zone for day boundaries. */
  timezone: string;
  lookaheadDays: number;
  /** Prefix class states with "H.mm-H.mm: ". */
  showClassTimes: boolean;
}

export function childOf(ctx: ProjectionContext): ChildSnapshot | undefined {
  return ctx.snapshot.children.get(ctx.childId);
}

export function eventsOf(ctx: ProjectionContext): readonly SchoolEvent[] {
  return childOf(ctx)?.events ?? [];
}

export function tasksOf(ctx: ProjectionContext): readonly SchoolTask[] {
  return childOf(ctx)?.tasks ?? [];
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

interface ViewBase<K extends string, S, A> {
  kind: K;
  childId: string;
  available: true;
  /** Instant the underlying snapshot was produced. */
  lastUpdated: string;
  state: S;
  attributes: A;
}

export interface UpcomingTaskEntry {
  id: string;
  title: string;
  subject: string;
  taskType: string;
  dueDate: string;
  daysUntilDue: number;
  setter: string;
}

export type UpcomingTasksView = ViewBase<
  'upcoming_tasks',
  number,
  {
    tasks: UpcomingTaskEntry[];
    tasksBySubject: Record<string, Array<{ title: string; dueDate: string; taskType: string }>>;
    tasksByDueDate: Record<string, Array<{ title: string; subject: string; taskType: string }>>;
    overdueCount: number;
  }
>;

export interface DueTodayEntry {
  id: string;
  title: string;
  subject: string;
  taskType: string;
  setter: string;
  dueDate: string;
  description: string;
}

export type TasksDueTodayView = ViewBase<
  'tasks_due_today',
  number,
  {
    tasks: DueTodayEntry[];
    urgentTasks: Array<{ title: string; subject: string; taskType: string }>;
    tasksBySubject: Record<string, number>;
    countsByType: Record<string, number>;
  }
>;

export interface OverdueEntry {
  id: string;
  title: string;
  subject: string;
  taskType: string;
  setter: string;
  dueDate: string;
  daysOverdue: number;
  description: string;
}

export type OverdueTasksView = ViewBase<'overdue_tasks', number, { tasks: OverdueEntry[] }>;

export interface ClassDetails {
  className: string;
  location: string | null;
  startTime: string;
  endTime: string;
  description: string | null;
  currentTime: string;
}

export type CurrentClassAttributes =
  | { status: 'no_current_class'; currentTime: string }
  | (ClassDetails & { status: 'in_class'; minutesRemaining: number });

export type CurrentClassView = ViewBase<'current_class', string, CurrentClassAttributes>;

/**
 * - next_class_today: the next lesson starts later today
 * - last_class_of_day: today had lessons, none remain; the next is on a later day
 * - next_class_future_day: today had no lessons at all
 */
export type NextClassContext = 'next_class_today' | 'last_class_of_day' | 'next_class_future_day';

export type NextClassAttributes =
  | { status: 'no_upcoming_class'; currentTime: string }
  | (ClassDetails & { status: 'class_scheduled'; minutesUntil: number; context: NextClassContext });

export type NextClassView = ViewBase<'next_class', string, NextClassAttributes>;

export type TodoStatus = 'needs_action' | 'completed';

export interface TodoItem {
  uid: string;
  summary: string;
  status: TodoStatus;
  due: string | null;
  description: string | null;
}

/** State is the number of items still needing action. */
export type TodoView = ViewBase<'todo', number, { items: TodoItem[] }>;

export type DerivedView =
  | UpcomingTasksView
  | TasksDueTodayView
  | OverdueTasksView
  | CurrentClassView
  | NextClassView
  | TodoView;

export type ViewKind = DerivedView['kind'];

export type ViewOf<K extends ViewKind> = Extract<DerivedView, { kind: K }>;

export const VIEW_KINDS: readonly ViewKind[] = [
  'upcoming_tasks',
  'tasks_due_today',
  'overdue_tasks',
  'current_class',
  'next_class',
  'todo',
];

/** Returned instead of a view when there is nothing to project from. */
export interface UnavailableView<K extends ViewKind = ViewKind> {
  kind: K;
  childId: string;
  available: false;
  reason: 'no_data' | 'unknown_child';
}

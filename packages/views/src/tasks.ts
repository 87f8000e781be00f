/**
 * @schoolbell/views - Task buckets
 *
 *   upcoming   due in (now, now + lookahead]
 *   due today  due on now's local calendar day
 *   overdue    due before the start of today (local), not completed
 *
 * A task due exactly at `now` is due today only.
 */

import {
  addLocalDays,
  ceilDays,
  floorDays,
  localDay,
  toLocalIso,
  truncate,
  type SchoolTask,
} from '@schoolbell/core';
import {
  tasksOf,
  type DueTodayEntry,
  type OverdueEntry,
  type OverdueTasksView,
  type ProjectionContext,
  type TasksDueTodayView,
  type UpcomingTaskEntry,
  type UpcomingTasksView,
} from './types.js';

const DESCRIPTION_LIMIT = 100;
const URGENT_TYPES = new Set(['test', 'project']);

type DatedTask = SchoolTask & { dueAt: Date };

function hasDueDate(task: SchoolTask): task is DatedTask {
  return task.dueAt !== null;
}

function byDueDate(a: DatedTask, b: DatedTask): number {
  return a.dueAt.getTime() - b.dueAt.getTime();
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

export function selectUpcomingTasks(ctx: ProjectionContext): DatedTask[] {
  const now = ctx.now.getTime();
  const horizon = addLocalDays(ctx.now, ctx.lookaheadDays, ctx.timezone).getTime();

  return tasksOf(ctx)
    .filter(hasDueDate)
    .filter((t) => t.dueAt.getTime() > now && t.dueAt.getTime() <= horizon)
    .sort(byDueDate);
}

export function selectTasksDueToday(ctx: ProjectionContext): DatedTask[] {
  const today = localDay(ctx.now, ctx.timezone);
  const start = today.start.getTime();
  const end = today.end.getTime();

  return tasksOf(ctx)
    .filter(hasDueDate)
    .filter((t) => t.dueAt.getTime() >= start && t.dueAt.getTime() < end)
    .sort(byDueDate);
}

export function selectOverdueTasks(ctx: ProjectionContext): DatedTask[] {
  const startOfToday = localDay(ctx.now, ctx.timezone).start.getTime();

  return tasksOf(ctx)
    .filter(hasDueDate)
    .filter((t) => !t.completed && t.dueAt.getTime() < startOfToday)
    .sort(byDueDate);
}

/** Always at least 1 for a task that is overdue. */
export function daysOverdue(task: DatedTask, ctx: ProjectionContext): number {
  const startOfToday = localDay(ctx.now, ctx.timezone).start;
  return Math.max(1, floorDays(task.dueAt, startOfToday));
}

function shortDescription(description: string): string {
  return truncate(description, DESCRIPTION_LIMIT);
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

export function projectUpcomingTasks(ctx: ProjectionContext): UpcomingTasksView {
  const tasks = selectUpcomingTasks(ctx);

  const entries: UpcomingTaskEntry[] = tasks.map((t) => ({
    id: t.id,
    title: t.title,
    subject: t.subject,
    taskType: t.taskType,
    dueDate: toLocalIso(t.dueAt, ctx.timezone),
    daysUntilDue: ceilDays(ctx.now, t.dueAt),
    setter: t.setter,
  }));

  const tasksBySubject: UpcomingTasksView['attributes']['tasksBySubject'] = {};
  const tasksByDueDate: UpcomingTasksView['attributes']['tasksByDueDate'] = {};

  for (const t of tasks) {
    (tasksBySubject[t.subject] ??= []).push({
      title: t.title,
      dueDate: toLocalIso(t.dueAt, ctx.timezone),
      taskType: t.taskType,
    });
    (tasksByDueDate[localDay(t.dueAt, ctx.timezone).date] ??= []).push({
      title: t.title,
      subject: t.subject,
      taskType: t.taskType,
    });
  }

  return {
    kind: 'upcoming_tasks',
    childId: ctx.childId,
    available: true,
    lastUpdated: ctx.snapshot.producedAt.toISOString(),
    state: entries.length,
    attributes: {
      tasks: entries,
      tasksBySubject,
      tasksByDueDate,
      overdueCount: selectOverdueTasks(ctx).length,
    },
  };
}

export function projectTasksDueToday(ctx: ProjectionContext): TasksDueTodayView {
  const tasks = selectTasksDueToday(ctx);

  const entries: DueTodayEntry[] = tasks.map((t) => ({
    id: t.id,
    title: t.title,
    subject: t.subject,
    taskType: t.taskType,
    setter: t.setter,
    dueDate: toLocalIso(t.dueAt, ctx.timezone),
    description: shortDescription(t.description),
  }));

  const tasksBySubject: Record<string, number> = {};
  const countsByType: Record<string, number> = {};
  for (const t of tasks) {
    tasksBySubject[t.subject] = (tasksBySubject[t.subject] ?? 0) + 1;
    countsByType[t.taskType] = (countsByType[t.taskType] ?? 0) + 1;
  }

  return {
    kind: 'tasks_due_today',
    childId: ctx.childId,
    available: true,
    lastUpdated: ctx.snapshot.producedAt.toISOString(),
    state: entries.length,
    attributes: {
      tasks: entries,
      urgentTasks: tasks
        .filter((t) => URGENT_TYPES.has(t.taskType) || t.title.toLowerCase().includes('urgent'))
        .map((t) => ({ title: t.title, subject: t.subject, taskType: t.taskType })),
      tasksBySubject,
      countsByType,
    },
  };
}

export function projectOverdueTasks(ctx: ProjectionContext): OverdueTasksView {
  const entries: OverdueEntry[] = selectOverdueTasks(ctx).map((t) => ({
    id: t.id,
    title: t.title,
    subject: t.subject,
    taskType: t.taskType,
    setter: t.setter,
    dueDate: toLocalIso(t.dueAt, ctx.timezone),
    daysOverdue: daysOverdue(t, ctx),
    description: shortDescription(t.description),
  }));

  return {
    kind: 'overdue_tasks',
    childId: ctx.childId,
    available: true,
    lastUpdated: ctx.snapshot.producedAt.toISOString(),
    state: entries.length,
    attributes: { tasks: entries },
  };
}

/**
 * @schoolbell/views - Todo projection
 *
 * Union of the upcoming, overdue and due-today buckets, one item per task id.
 */

import { toLocalIso, type SchoolTask } from '@schoolbell/core';
import { selectOverdueTasks, selectTasksDueToday, selectUpcomingTasks } from './tasks.js';
import type { ProjectionContext, TodoItem, TodoView } from './types.js';

function describeTask(task: SchoolTask): string | null {
  const parts: string[] = [];
  if (task.setter) parts.push(`Set by: ${task.setter}`);
  if (task.taskType) parts.push(`Type: ${task.taskType}`);
  if (task.description) parts.push(task.description);
  return parts.length > 0 ? parts.join('\n') : null;
}

export function toTodoItem(task: SchoolTask, zone: string): TodoItem {
  return {
    uid: task.id,
    summary: task.title,
    status: task.completed ? 'completed' : 'needs_action',
    due: task.dueAt ? toLocalIso(task.dueAt, zone) : null,
    description: describeTask(task),
  };
}

export function projectTodo(ctx: ProjectionContext): TodoView {
  const unique = new Map<string, TodoItem>();

  for (const bucket of [selectUpcomingTasks(ctx), selectOverdueTasks(ctx), selectTasksDueToday(ctx)]) {
    for (const task of bucket) {
      if (!unique.has(task.id)) {
        unique.set(task.id, toTodoItem(task, ctx.timezone));
      }
    }
  }

  const items = [...unique.values()];

  return {
    kind: 'todo',
    childId: ctx.childId,
    available: true,
    lastUpdated: ctx.snapshot.producedAt.toISOString(),
    state: items.filter((i) => i.status === 'needs_action').length,
    attributes: { items },
  };
}

/**
 * @schoolbell/views - View Projector
 *
 * Pure, stateless projections from a snapshot and "now" to the per-child
 * derived views (task buckets, current/next class, todo list, calendar).
 *
 * @packageDocumentation
 */

import { projectCurrentClass, projectNextClass } from './classes.js';
import { projectOverdueTasks, projectTasksDueToday, projectUpcomingTasks } from './tasks.js';
import { projectTodo } from './todo.js';
import type { ProjectionContext, ViewKind, ViewOf } from './types.js';

const PROJECTORS: { [K in ViewKind]: (ctx: ProjectionContext) => ViewOf<K> } = {
  upcoming_tasks: projectUpcomingTasks,
  tasks_due_today: projectTasksDueToday,
  overdue_tasks: projectOverdueTasks,
  current_class: projectCurrentClass,
  next_class: projectNextClass,
  todo: projectTodo,
};

/**
 * Compute one view kind for the child named in `ctx`.
 */
export function projectView<K extends ViewKind>(kind: K, ctx: ProjectionContext): ViewOf<K> {
  return PROJECTORS[kind](ctx);
}

export {
  selectUpcomingTasks,
  selectTasksDueToday,
  selectOverdueTasks,
  daysOverdue,
  projectUpcomingTasks,
  projectTasksDueToday,
  projectOverdueTasks,
} from './tasks.js';

export {
  NO_CLASS,
  selectCurrentEvent,
  selectNextEvent,
  nextClassContext,
  classLabel,
  projectCurrentClass,
  projectNextClass,
} from './classes.js';

export { projectTodo, toTodoItem } from './todo.js';

export {
  calendarEvents,
  currentOrNextEvent,
  describeEvent,
  toCalendarEntry,
  type CalendarEntry,
} from './calendar.js';

export {
  VIEW_KINDS,
  type ProjectionContext,
  type DerivedView,
  type ViewKind,
  type ViewOf,
  type UnavailableView,
  type UpcomingTasksView,
  type UpcomingTaskEntry,
  type TasksDueTodayView,
  type DueTodayEntry,
  type OverdueTasksView,
  type OverdueEntry,
  type CurrentClassView,
  type CurrentClassAttributes,
  type NextClassView,
  type NextClassAttributes,
  type NextClassContext,
  type ClassDetails,
  type TodoView,
  type TodoItem,
  type TodoStatus,
} from './types.js';

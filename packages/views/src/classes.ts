/**
 * @schoolbell/views - Current / next class
 *
 * Containment and ordering compare absolute instants; "today" comes from
 * `localDay` in the child's zone. The current class has start <= now and the
 * next class has start > now, so the two never point at the same lesson.
 */

import { ceilMinutes, formatLocal, isSameLocalDay, toLocalIso, type SchoolEvent } from '@schoolbell/core';
import {
  eventsOf,
  type ClassDetails,
  type CurrentClassView,
  type NextClassContext,
  type NextClassView,
  type ProjectionContext,
} from './types.js';

export const NO_CLASS = 'None';

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/**
 * The lesson running at `now` (start <= now < end). When several overlap the
 * most recently started one wins.
 */
export function selectCurrentEvent(events: readonly SchoolEvent[], now: Date): SchoolEvent | undefined {
  const t = now.getTime();
  let current: SchoolEvent | undefined;

  for (const event of events) {
    if (event.start.getTime() <= t && t < event.end.getTime()) {
      if (!current || event.start.getTime() > current.start.getTime()) {
        current = event;
      }
    }
  }

  return current;
}

/** The lesson with the earliest start strictly after `now`. */
export function selectNextEvent(events: readonly SchoolEvent[], now: Date): SchoolEvent | undefined {
  const t = now.getTime();
  let next: SchoolEvent | undefined;

  for (const event of events) {
    if (event.start.getTime() > t && (!next || event.start.getTime() < next.start.getTime())) {
      next = event;
    }
  }

  return next;
}

export function nextClassContext(
  events: readonly SchoolEvent[],
  next: SchoolEvent,
  now: Date,
  zone: string,
): NextClassContext {
  if (isSameLocalDay(next.start, now, zone)) {
    return 'next_class_today';
  }

  const hadClassesToday = events.some((e) => isSameLocalDay(e.start, now, zone));
  return hadClassesToday ? 'last_class_of_day' : 'next_class_future_day';
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** "9.05-10.00: Maths" when times are shown, otherwise the bare subject. */
export function classLabel(event: SchoolEvent, zone: string, showTimes: boolean): string {
  if (!showTimes) {
    return event.subject;
  }
  const start = formatLocal(event.start, zone, 'H.mm');
  const end = formatLocal(event.end, zone, 'H.mm');
  return `${start}-${end}: ${event.subject}`;
}

function details(event: SchoolEvent, ctx: ProjectionContext): ClassDetails {
  return {
    className: event.subject,
    location: event.location,
    startTime: toLocalIso(event.start, ctx.timezone),
    endTime: toLocalIso(event.end, ctx.timezone),
    description: event.description,
    currentTime: toLocalIso(ctx.now, ctx.timezone),
  };
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

export function projectCurrentClass(ctx: ProjectionContext): CurrentClassView {
  const base = {
    kind: 'current_class' as const,
    childId: ctx.childId,
    available: true as const,
    lastUpdated: ctx.snapshot.producedAt.toISOString(),
  };
  const current = selectCurrentEvent(eventsOf(ctx), ctx.now);

  if (!current) {
    return {
      ...base,
      state: NO_CLASS,
      attributes: { status: 'no_current_class', currentTime: toLocalIso(ctx.now, ctx.timezone) },
    };
  }

  return {
    ...base,
    state: classLabel(current, ctx.timezone, ctx.showClassTimes),
    attributes: {
      ...details(current, ctx),
      status: 'in_class',
      minutesRemaining: ceilMinutes(ctx.now, current.end),
    },
  };
}

export function projectNextClass(ctx: ProjectionContext): NextClassView {
  const base = {
    kind: 'next_class' as const,
    childId: ctx.childId,
    available: true as const,
    lastUpdated: ctx.snapshot.producedAt.toISOString(),
  };
  const events = eventsOf(ctx);
  const next = selectNextEvent(events, ctx.now);

  if (!next) {
    return {
      ...base,
      state: NO_CLASS,
      attributes: { status: 'no_upcoming_class', currentTime: toLocalIso(ctx.now, ctx.timezone) },
    };
  }

  return {
    ...base,
    state: classLabel(next, ctx.timezone, ctx.showClassTimes),
    attributes: {
      ...details(next, ctx),
      status: 'class_scheduled',
      minutesUntil: ceilMinutes(ctx.now, next.start),
      context: nextClassContext(events, next, ctx.now, ctx.timezone),
    },
  };
}

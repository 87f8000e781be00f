/**
 * @schoolbell/views - Calendar entries
 */

import type { SchoolEvent, Snapshot } from '@schoolbell/core';
import { selectCurrentEvent, selectNextEvent } from './classes.js';

const MAX_ATTENDEES = 5;

export interface CalendarEntry {
  summary: string;
  start: Date;
  end: Date;
  location: string | null;
  description: string | null;
}

/**
 * Description, teaching group and the first few attendees, one per line.
 */
export function describeEvent(event: SchoolEvent): string | null {
  const parts: string[] = [];

  if (event.description) {
    parts.push(event.description);
  }
  if (event.guild) {
    parts.push(`Class: ${event.guild}`);
  }
  if (event.attendees.length > 0) {
    let names = event.attendees.slice(0, MAX_ATTENDEES).join(', ');
    if (event.attendees.length > MAX_ATTENDEES) {
      names += ` and ${event.attendees.length - MAX_ATTENDEES} more`;
    }
    parts.push(`Attendees: ${names}`);
  }

  return parts.length > 0 ? parts.join('\n') : null;
}

export function toCalendarEntry(event: SchoolEvent): CalendarEntry {
  return {
    summary: event.subject,
    start: event.start,
    end: event.end,
    location: event.location,
    description: describeEvent(event),
  };
}

/**
 * Lessons overlapping [start, end), in start order.
 */
export function calendarEvents(snapshot: Snapshot, childId: string, start: Date, end: Date): CalendarEntry[] {
  const events = snapshot.children.get(childId)?.events ?? [];
  return events
    .filter((e) => e.end.getTime() > start.getTime() && e.start.getTime() < end.getTime())
    .map(toCalendarEntry);
}

/**
 * The running lesson, or the next one when nothing is running.
 */
export function currentOrNextEvent(snapshot: Snapshot, childId: string, now: Date): CalendarEntry | null {
  const events = snapshot.children.get(childId)?.events ?? [];
  const event = selectCurrentEvent(events, now) ?? selectNextEvent(events, now);
  return event ? toCalendarEntry(event) : null;
}

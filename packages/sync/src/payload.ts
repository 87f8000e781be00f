/**
 * @schoolbell/sync - Payload normalisation
 *
 * The transport hands back raw JSON. Records are checked one at a time with
 * TypeBox; a bad record is skipped, a payload that is not a list at all fails
 * the cycle with a DataFormatError.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { Logger } from 'pino';
import { parseInstant, type SchoolEvent, type SchoolTask } from '@schoolbell/core';
import { DataFormatError } from '@schoolbell/health';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Optional(Type.Union([schema, Type.Null()]));

const NamedSchema = Type.Object({ name: Type.String() });

const AttendeeSchema = Type.Union([
  Type.String(),
  Type.Object({ principal: NamedSchema }),
  NamedSchema,
]);

export const RawEventSchema = Type.Object({
  id: Type.Optional(Type.String()),
  guid: Type.Optional(Type.String()),
  start: Type.Optional(Type.String()),
  end: Type.Optional(Type.String()),
  startUtc: Type.Optional(Type.String()),
  endUtc: Type.Optional(Type.String()),
  subject: Nullable(Type.String()),
  location: Nullable(Type.String()),
  description: Nullable(Type.String()),
  guild: Nullable(Type.String()),
  attendees: Nullable(Type.Array(Type.Unknown())),
});

export type RawEvent = Static<typeof RawEventSchema>;

const LooseNamedSchema = Type.Object({ name: Type.Optional(Type.String()) });

export const RawTaskSchema = Type.Object({
  guid: Type.Optional(Type.String()),
  id: Type.Optional(Type.Union([Type.String(), Type.Number()])),
  title: Nullable(Type.String()),
  description: Nullable(Type.String()),
  dueDate: Nullable(Type.String()),
  setDate: Nullable(Type.String()),
  subject: Nullable(Type.Union([Type.String(), LooseNamedSchema])),
  setter: Nullable(Type.Union([Type.String(), LooseNamedSchema])),
  taskType: Nullable(Type.String()),
  completionStatus: Nullable(Type.String()),
});

export type RawTask = Static<typeof RawTaskSchema>;

const COMPLETED_STATUSES = new Set(['done', 'completed']);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function expectList(raw: unknown, what: string): unknown[] {
  if (!Array.isArray(raw)) {
    throw new DataFormatError(`Expected a list of ${what}, got ${raw === null ? 'null' : typeof raw}`);
  }
  return raw;
}

function attendeeName(value: unknown): string | null {
  if (!Value.Check(AttendeeSchema, value)) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  return 'principal' in value ? value.principal.name : value.name;
}

function nameOf(value: string | { name?: string } | null | undefined, fallback: string): string {
  if (typeof value === 'string') {
    return value || fallback;
  }
  return value?.name || fallback;
}

function optionalDate(value: string | null | undefined): Date | null {
  return value ? parseInstant(value) : null;
}

export function isCompletedStatus(status: string): boolean {
  return COMPLETED_STATUSES.has(status.trim().toLowerCase());
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/**
 * Normalise raw lessons for one child, sorted by start.
 */
export function parseEvents(raw: unknown, childId: string, log?: Logger): SchoolEvent[] {
  const events: SchoolEvent[] = [];

  for (const [index, record] of expectList(raw, 'events').entries()) {
    if (!Value.Check(RawEventSchema, record)) {
      log?.debug({ childId, index }, 'Skipping malformed event record');
      continue;
    }

    const startText = record.start ?? record.startUtc;
    const endText = record.end ?? record.endUtc;
    const start = startText ? parseInstant(startText) : null;
    const end = endText ? parseInstant(endText) : null;

    if (!start || !end || start.getTime() >= end.getTime()) {
      log?.debug({ childId, index, start: startText, end: endText }, 'Skipping event with invalid times');
      continue;
    }

    const attendees: string[] = [];
    for (const attendee of record.attendees ?? []) {
      const name = attendeeName(attendee);
      if (name) attendees.push(name);
    }

    events.push({
      id: record.guid ?? record.id,
      childId,
      start,
      end,
      subject: record.subject || 'Unknown Subject',
      location: record.location ?? null,
      description: record.description ?? null,
      guild: record.guild ?? null,
      attendees,
    });
  }

  return events.sort((a, b) => a.start.getTime() - b.start.getTime());
}

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

/**
 * Normalise raw tasks for one child. Records without a `guid` or `id` are
 * dropped since the todo list keys on it.
 */
export function parseTasks(raw: unknown, childId: string, log?: Logger): SchoolTask[] {
  const tasks: SchoolTask[] = [];

  for (const [index, record] of expectList(raw, 'tasks').entries()) {
    if (!Value.Check(RawTaskSchema, record)) {
      log?.debug({ childId, index }, 'Skipping malformed task record');
      continue;
    }

    const id = record.guid ?? (record.id !== undefined ? String(record.id) : undefined);
    if (!id) {
      log?.debug({ childId, index }, 'Skipping task without an id');
      continue;
    }

    const dueAt = optionalDate(record.dueDate);
    if (record.dueDate && !dueAt) {
      log?.debug({ childId, id, dueDate: record.dueDate }, 'Invalid due date');
    }

    const completionStatus = record.completionStatus || 'Unknown';

    tasks.push({
      id,
      childId,
      title: record.title || 'Untitled Task',
      description: record.description ?? '',
      dueAt,
      setAt: optionalDate(record.setDate),
      subject: nameOf(record.subject, 'Unknown Subject'),
      taskType: record.taskType || 'homework',
      setter: nameOf(record.setter, 'Unknown'),
      completionStatus,
      completed: isCompletedStatus(completionStatus),
    });
  }

  return tasks;
}

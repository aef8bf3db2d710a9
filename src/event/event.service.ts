import { BadRequestException, Inject, Injectable, NotFoundException } from '@nestjs/common';
import { and, asc, count, eq, gte, inArray, isNotNull, isNull, lt, or } from 'drizzle-orm';

import type { MessageResponse } from '../common/dto/message.dto';
import {
  addDays,
  atTimeOfDay,
  daysBetween,
  monthBounds,
  parseDateString,
  timeOfDayMs,
  toDateString,
  todayDateString,
} from '../common/utils/date.util';
import { assertOwnership, formatIds } from '../common/utils/ownership.util';
import { DRIZZLE, type Database, type Executor } from '../database/database.constants';
import {
  type EventPupil,
  type EventRecord,
  type EventRepeatDay,
  type NewEventRecord,
  eventPupils,
  eventRepeatDays,
  events,
} from '../database/schema';
import { PupilService } from '../pupil/pupil.service';
import { CreateEventDto, UpdateEventDto } from './dto/create-event.dto';
import { EventListQueryDto } from './dto/event-query.dto';
import { type EventOccurrence, compareByStartTime, expandOccurrences } from './event-occurrences';
import {
  type EventShape,
  assertRepeatDayRange,
  assertRepeatDaysPresent,
  assertStoresRepeatDays,
  assertValidEvent,
  isDayBased,
  normalizeRepeatDays,
} from './event.validation';

const MAX_RANGE_DAYS = 366;

export interface EventDetails extends EventRecord {
  repeatDays: number[];
}

@Injectable()
export class EventService {
  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
    private readonly pupilService: PupilService,
  ) {}

  async create(ownerId: number, createEventDto: CreateEventDto): Promise<EventDetails> {
    const shape: EventShape = {
      eventType: createEventDto.eventType,
      startTime: new Date(createEventDto.startTime),
      endTime: new Date(createEventDto.endTime),
      repeatPattern: createEventDto.repeatPattern ?? null,
      repeatUntil:
        createEventDto.eventType === 'once' ? null : (createEventDto.repeatUntil ?? null),
    };
    const repeatDays = normalizeRepeatDays(createEventDto.repeatDays ?? []);
    assertValidEvent(shape, repeatDays);
    const storedDays = isDayBased(shape.repeatPattern) ? repeatDays : [];

    return this.db.transaction(async (tx) => {
      const [event] = await tx
        .insert(events)
        .values({
          ...shape,
          title: createEventDto.title,
          description: createEventDto.description ?? null,
          ownerId,
        })
        .returning();
      await this.insertRepeatDays(tx, event.id, storedDays);
      return { ...event, repeatDays: storedDays };
    });
  }

  /**
   * Lists the events that can occur between `startDate` and `endDate`. Without
   * dates the range is the current month; an end date defaults to the end of the
   * start date's month. Ranges are capped at a year (366 days).
   */
  async findAll(
    ownerId: number,
    query: EventListQueryDto,
  ): Promise<EventRecord[] | EventOccurrence[]> {
    const from = query.startDate ?? monthBounds(todayDateString()).first;
    const to = query.endDate ?? monthBounds(from).last;
    if (from > to) {
      throw new BadRequestException('Start date must not be after end date');
    }
    if (daysBetween(from, to) + 1 > MAX_RANGE_DAYS) {
      throw new BadRequestException(`Date range must not exceed ${MAX_RANGE_DAYS} days`);
    }

    const rangeStart = parseDateString(from);
    const rangeEnd = parseDateString(addDays(to, 1));

    const rows = await this.db
      .select()
      .from(events)
      .where(
        and(
          eq(events.ownerId, ownerId),
          query.eventType ? eq(events.eventType, query.eventType) : undefined,
          or(
            and(
              isNull(events.repeatPattern),
              gte(events.startTime, rangeStart),
              lt(events.startTime, rangeEnd),
            ),
            and(
              isNotNull(events.repeatPattern),
              lt(events.startTime, rangeEnd),
              or(isNull(events.repeatUntil), gte(events.repeatUntil, from)),
            ),
          ),
        ),
      )
      .orderBy(asc(events.startTime), asc(events.id));

    if (query.includeRepeats === 'false') {
      return rows;
    }

    const daysByEvent = await this.repeatDaysByEvent(rows.map((event) => event.id));
    return rows
      .flatMap((event) => expandOccurrences(event, daysByEvent.get(event.id) ?? [], { from, to }))
      .sort(compareByStartTime);
  }

  async findOne(id: number, ownerId: number, action = 'access'): Promise<EventRecord> {
    const [event] = await this.db.select().from(events).where(eq(events.id, id));
    return assertOwnership(event, ownerId, 'Event', action);
  }

  async findDetails(id: number, ownerId: number): Promise<EventDetails> {
    const event = await this.findOne(id, ownerId);
    return { ...event, repeatDays: await this.repeatDayNumbers(this.db, event.id) };
  }

  /**
   * With `futureOnly` on a series that has already started and is still running,
   * the series is split: the stored event ends yesterday and a new event carrying
   * the changes starts today. Otherwise the event is updated in place.
   */
  async update(
    id: number,
    ownerId: number,
    updateEventDto: UpdateEventDto,
    futureOnly: boolean,
  ): Promise<EventDetails> {
    const event = await this.findOne(id, ownerId, 'update');
    const repeatDays =
      updateEventDto.repeatDays === undefined
        ? undefined
        : normalizeRepeatDays(updateEventDto.repeatDays);
    if (repeatDays) assertRepeatDayRange(repeatDays);

    const today = todayDateString();
    const runsPastToday =
      event.repeatPattern !== null &&
      toDateString(event.startTime) < today &&
      (event.repeatUntil === null || event.repeatUntil >= today);

    if (futureOnly && runsPastToday) {
      return this.splitSeries(event, updateEventDto, repeatDays, today);
    }
    return this.updateInPlace(event, updateEventDto, repeatDays);
  }

  /**
   * With `futureOnly` on a series, instances after today go away and today's
   * stays. A series that has not started yet is deleted outright; one that has
   * already ended is left as it is.
   */
  async remove(id: number, ownerId: number, futureOnly: boolean): Promise<MessageResponse> {
    const event = await this.findOne(id, ownerId, 'delete');
    const today = todayDateString();

    if (event.repeatPattern !== null && futureOnly && toDateString(event.startTime) <= today) {
      if (event.repeatUntil === null || event.repeatUntil > today) {
        await this.db
          .update(events)
          .set({ repeatUntil: today, updatedAt: new Date() })
          .where(eq(events.id, id));
      }
      return { message: 'Future instances of repeat event deleted' };
    }

    await this.db.delete(events).where(eq(events.id, id));
    return { message: 'Event deleted successfully' };
  }

  async findRepeatDays(eventId: number, ownerId: number): Promise<EventRepeatDay[]> {
    await this.findOne(eventId, ownerId);
    return this.db
      .select()
      .from(eventRepeatDays)
      .where(eq(eventRepeatDays.eventId, eventId))
      .orderBy(asc(eventRepeatDays.id));
  }

  async addRepeatDays(
    eventId: number,
    ownerId: number,
    days: readonly number[],
  ): Promise<EventRepeatDay[]> {
    const event = await this.findOne(eventId, ownerId, 'modify');
    assertStoresRepeatDays(event.repeatPattern);
    const normalized = normalizeRepeatDays(days);
    assertRepeatDayRange(normalized);

    return this.db
      .insert(eventRepeatDays)
      .values(normalized.map((dayOfWeek) => ({ eventId, dayOfWeek })))
      .returning();
  }

  async updateRepeatDays(
    eventId: number,
    ownerId: number,
    days: ReadonlyArray<{ id: number; dayOfWeek: number }>,
  ): Promise<EventRepeatDay[]> {
    const event = await this.findOne(eventId, ownerId, 'modify');
    assertStoresRepeatDays(event.repeatPattern);
    assertRepeatDayRange(days.map((day) => day.dayOfWeek));

    return this.db.transaction(async (tx) => {
      const updated: EventRepeatDay[] = [];
      for (const day of days) {
        const [row] = await tx
          .update(eventRepeatDays)
          .set({ dayOfWeek: day.dayOfWeek })
          .where(and(eq(eventRepeatDays.id, day.id), eq(eventRepeatDays.eventId, eventId)))
          .returning();
        if (!row) {
          throw new NotFoundException(`Repeat day ${day.id} not found for this event`);
        }
        updated.push(row);
      }
      return updated;
    });
  }

  async removeRepeatDays(eventId: number, ownerId: number, ids: readonly number[]): Promise<void> {
    const event = await this.findOne(eventId, ownerId, 'modify');

    await this.db.transaction(async (tx) => {
      const removed = await tx
        .delete(eventRepeatDays)
        .where(and(eq(eventRepeatDays.eventId, eventId), inArray(eventRepeatDays.id, [...ids])))
        .returning({ id: eventRepeatDays.id });
      if (removed.length === 0) {
        throw new NotFoundException('No matching repeat days found');
      }

      const [remaining] = await tx
        .select({ total: count() })
        .from(eventRepeatDays)
        .where(eq(eventRepeatDays.eventId, eventId));
      assertRepeatDaysPresent(event.repeatPattern, remaining.total);
    });
  }

  async findPupils(eventId: number, ownerId: number): Promise<EventPupil[]> {
    await this.findOne(eventId, ownerId);
    return this.db
      .select()
      .from(eventPupils)
      .where(eq(eventPupils.eventId, eventId))
      .orderBy(asc(eventPupils.id));
  }

  async addPupils(
    eventId: number,
    ownerId: number,
    pupilIds: readonly number[],
  ): Promise<EventPupil[]> {
    await this.findOne(eventId, ownerId, 'modify');
    const ids = [...new Set(pupilIds)];

    return this.db.transaction(async (tx) => {
      await this.pupilService.assertOwnedPupils(ids, ownerId, tx);

      const existing = await tx
        .select({ pupilId: eventPupils.pupilId })
        .from(eventPupils)
        .where(and(eq(eventPupils.eventId, eventId), inArray(eventPupils.pupilId, ids)))
        .orderBy(asc(eventPupils.pupilId));
      if (existing.length > 0) {
        const taken = formatIds(existing.map((row) => row.pupilId));
        throw new BadRequestException(
          `Pupils with IDs ${taken} are already assigned to this event`,
        );
      }

      return tx
        .insert(eventPupils)
        .values(ids.map((pupilId) => ({ eventId, pupilId })))
        .returning();
    });
  }

  async updatePupils(
    eventId: number,
    ownerId: number,
    assignments: ReadonlyArray<{ id: number; pupilId: number }>,
  ): Promise<EventPupil[]> {
    await this.findOne(eventId, ownerId, 'modify');

    return this.db.transaction(async (tx) => {
      await this.pupilService.assertOwnedPupils(
        [...new Set(assignments.map((assignment) => assignment.pupilId))],
        ownerId,
        tx,
      );

      const updated: EventPupil[] = [];
      for (const assignment of assignments) {
        const [row] = await tx
          .update(eventPupils)
          .set({ pupilId: assignment.pupilId })
          .where(and(eq(eventPupils.id, assignment.id), eq(eventPupils.eventId, eventId)))
          .returning();
        if (!row) {
          throw new NotFoundException(`Pupil assignment ${assignment.id} not found for this event`);
        }
        updated.push(row);
      }
      return updated;
    });
  }

  async removePupils(eventId: number, ownerId: number, pupilIds: readonly number[]): Promise<void> {
    await this.findOne(eventId, ownerId, 'modify');
    const removed = await this.db
      .delete(eventPupils)
      .where(and(eq(eventPupils.eventId, eventId), inArray(eventPupils.pupilId, [...pupilIds])))
      .returning({ id: eventPupils.id });
    if (removed.length === 0) {
      throw new NotFoundException('No pupil assignments found');
    }
  }

  private async updateInPlace(
    event: EventRecord,
    updateEventDto: UpdateEventDto,
    repeatDays: number[] | undefined,
  ): Promise<EventDetails> {
    const shape = this.mergeShape(event, updateEventDto);
    const existingDays = await this.repeatDayNumbers(this.db, event.id);
    const effectiveDays = repeatDays ?? existingDays;
    const dayBased = isDayBased(shape.repeatPattern);
    assertValidEvent(shape, dayBased ? effectiveDays : (repeatDays ?? []));

    const values: Partial<NewEventRecord> = { ...shape, updatedAt: new Date() };
    if (updateEventDto.title !== undefined) values.title = updateEventDto.title;
    if (updateEventDto.description !== undefined) values.description = updateEventDto.description;

    return this.db.transaction(async (tx) => {
      const [updated] = await tx
        .update(events)
        .set(values)
        .where(eq(events.id, event.id))
        .returning();

      if (!dayBased && existingDays.length > 0) {
        await tx.delete(eventRepeatDays).where(eq(eventRepeatDays.eventId, event.id));
      } else if (dayBased && repeatDays !== undefined) {
        await tx.delete(eventRepeatDays).where(eq(eventRepeatDays.eventId, event.id));
        await this.insertRepeatDays(tx, event.id, repeatDays);
      }

      return { ...updated, repeatDays: dayBased ? effectiveDays : [] };
    });
  }

  private async splitSeries(
    event: EventRecord,
    updateEventDto: UpdateEventDto,
    repeatDays: number[] | undefined,
    today: string,
  ): Promise<EventDetails> {
    const merged = this.mergeShape(event, updateEventDto);
    const startTime = atTimeOfDay(today, timeOfDayMs(merged.startTime));
    const shape: EventShape = {
      ...merged,
      startTime,
      endTime: new Date(
        startTime.getTime() + merged.endTime.getTime() - merged.startTime.getTime(),
      ),
    };
    const effectiveDays = repeatDays ?? (await this.repeatDayNumbers(this.db, event.id));
    const dayBased = isDayBased(shape.repeatPattern);
    assertValidEvent(shape, dayBased ? effectiveDays : (repeatDays ?? []));
    const storedDays = dayBased ? effectiveDays : [];

    return this.db.transaction(async (tx) => {
      await tx
        .update(events)
        .set({ repeatUntil: addDays(today, -1), updatedAt: new Date() })
        .where(eq(events.id, event.id));

      const [created] = await tx
        .insert(events)
        .values({
          ...shape,
          title: updateEventDto.title ?? event.title,
          description:
            updateEventDto.description !== undefined
              ? updateEventDto.description
              : event.description,
          ownerId: event.ownerId,
        })
        .returning();
      await this.insertRepeatDays(tx, created.id, storedDays);

      return { ...created, repeatDays: storedDays };
    });
  }

  /** The event's schedule with the requested changes applied. */
  private mergeShape(event: EventRecord, updateEventDto: UpdateEventDto): EventShape {
    const eventType = updateEventDto.eventType ?? event.eventType;
    const repeatPattern =
      updateEventDto.repeatPattern !== undefined
        ? updateEventDto.repeatPattern
        : eventType === 'once'
          ? null
          : event.repeatPattern;
    const repeatUntil =
      eventType === 'once'
        ? null
        : updateEventDto.repeatUntil !== undefined
          ? updateEventDto.repeatUntil
          : event.repeatUntil;

    return {
      eventType,
      startTime: updateEventDto.startTime ? new Date(updateEventDto.startTime) : event.startTime,
      endTime: updateEventDto.endTime ? new Date(updateEventDto.endTime) : event.endTime,
      repeatPattern,
      repeatUntil,
    };
  }

  private async insertRepeatDays(
    executor: Executor,
    eventId: number,
    days: readonly number[],
  ): Promise<void> {
    if (days.length === 0) return;
    await executor
      .insert(eventRepeatDays)
      .values(days.map((dayOfWeek) => ({ eventId, dayOfWeek })));
  }

  private async repeatDayNumbers(executor: Executor, eventId: number): Promise<number[]> {
    const rows = await executor
      .select({ dayOfWeek: eventRepeatDays.dayOfWeek })
      .from(eventRepeatDays)
      .where(eq(eventRepeatDays.eventId, eventId))
      .orderBy(asc(eventRepeatDays.dayOfWeek));
    return rows.map((row) => row.dayOfWeek);
  }

  private async repeatDaysByEvent(eventIds: readonly number[]): Promise<Map<number, number[]>> {
    const byEvent = new Map<number, number[]>();
    if (eventIds.length === 0) return byEvent;

    const rows = await this.db
      .select()
      .from(eventRepeatDays)
      .where(inArray(eventRepeatDays.eventId, [...eventIds]))
      .orderBy(asc(eventRepeatDays.dayOfWeek));
    for (const row of rows) {
      const days = byEvent.get(row.eventId) ?? [];
      days.push(row.dayOfWeek);
      byEvent.set(row.eventId, days);
    }
    return byEvent;
  }
}

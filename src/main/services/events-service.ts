import fs from 'fs-extra';
import { DateTime } from 'luxon';
import { parse } from 'yaml';
import { z } from 'zod';
import { describeError } from '../errors.js';
import { formatDateToken, weekAnchor } from '../utils/date.js';
import log from '../logger.js';

/** One milestone in `metadata.json`, linked to the week video that shows it. */
export interface TimelapseEvent {
  title: string;
  date: string;
  monday_date: string;
  description?: string;
}

const EventsFileSchema = z
  .object({
    events: z
      .array(
        z.object({
          title: z.string().optional(),
          date: z.string().optional(),
          description: z.string().optional()
        })
      )
      .nullish()
  })
  .nullish();

/**
 * Reads an `events:` list. Entries without a date, or with one that does not parse, are
 * dropped with a warning. Throws on malformed YAML or an unexpected shape.
 */
export const parseEvents = (text: string): TimelapseEvent[] => {
  const document = EventsFileSchema.parse(parse(text));
  const events: TimelapseEvent[] = [];
  for (const entry of document?.events ?? []) {
    if (!entry.date) {
      continue;
    }
    const date = DateTime.fromISO(entry.date, { zone: 'utc' });
    if (!date.isValid) {
      log.warn('Ignoring event "%s": unreadable date %s', entry.title ?? '', entry.date);
      continue;
    }
    events.push({
      title: entry.title ?? '',
      date: date.toISO({ includeOffset: false, suppressMilliseconds: true }) ?? entry.date,
      monday_date: formatDateToken(weekAnchor(date)),
      ...(entry.description !== undefined ? { description: entry.description } : {})
    });
  }
  return events;
};

/** Events from `filePath`; an absent or unreadable file contributes none. */
export const loadEvents = async (filePath: string): Promise<TimelapseEvent[]> => {
  if (!(await fs.pathExists(filePath))) {
    return [];
  }
  try {
    return parseEvents(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    log.warn('Failed to load events from %s: %s', filePath, describeError(error));
    return [];
  }
};

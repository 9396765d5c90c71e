// esg-backend/src/catalog/regulatoryCalendar.ts
// Regulatory calendar feed (JSON-backed by default)

import { z } from "zod";
import calendarJson from "../data/regulatory-calendar.json";
import { CatalogValidationError } from "../errors";
import type { RegulatoryCalendarEntry } from "../types/alerts";
import { daysUntil } from "../services/readiness";

const WILDCARD = "*";

const EntrySchema = z.object({
  id: z.string().min(1),
  regulation: z.string().min(1),
  industries: z.array(z.string().min(1)).min(1),
  deadline: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD"),
  timeline_days: z.number().int().positive(),
  threshold: z.number().gt(0).max(100),
  readiness: z.array(z.object({ metric: z.string().min(1), weight: z.number().positive() })).min(1),
  penalty_severity: z.enum(["low", "medium", "high"]),
  typical_penalty: z.string(),
});

const CalendarSchema = z.object({
  version: z.string(),
  entries: z.array(EntrySchema),
});

export interface RegulatoryCalendarFeed {
  /** Entries for the industry whose deadline is today or later, nearest first */
  entriesFor(industry: string, now: Date): RegulatoryCalendarEntry[];
}

export function parseCalendar(raw: unknown): RegulatoryCalendarEntry[] {
  const parsed = CalendarSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogValidationError(
      "regulatory calendar",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const ids = new Set<string>();
  for (const entry of parsed.data.entries) {
    if (ids.has(entry.id)) {
      throw new CatalogValidationError("regulatory calendar", [`${entry.id}: duplicate entry id`]);
    }
    ids.add(entry.id);
  }
  return parsed.data.entries;
}

export class StaticCalendarFeed implements RegulatoryCalendarFeed {
  private readonly entries: ReadonlyArray<RegulatoryCalendarEntry>;

  constructor(entries: RegulatoryCalendarEntry[]) {
    this.entries = entries.map((e) => Object.freeze({ ...e, industries: e.industries.map((i) => i.toLowerCase()) }));
  }

  entriesFor(industry: string, now: Date): RegulatoryCalendarEntry[] {
    const wanted = industry.trim().toLowerCase();
    return this.entries
      .filter((e) => e.industries.includes(WILDCARD) || e.industries.includes(wanted))
      .filter((e) => daysUntil(e.deadline, now) >= 0)
      .sort((a, b) => a.deadline.localeCompare(b.deadline) || a.id.localeCompare(b.id));
  }
}

export function loadDefaultCalendar(): StaticCalendarFeed {
  return new StaticCalendarFeed(parseCalendar(calendarJson));
}

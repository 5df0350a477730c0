/**
 * @fileoverview SQLite-backed structured lookup over the campus catalog.
 *
 * Queries that name a course code are answered from the prerequisites table
 * by exact match only: a code that is not in the catalog yields
 * `found = false`, never a neighbouring course. Everything else goes through
 * an FTS5 match over the FAQs, topped up with keyword matches over courses,
 * programs, deadlines and campus resources.
 *
 * @module campus-guide/catalog/catalog-store
 */

import { readFileSync } from 'node:fs';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type { LookupRecord, LookupResponse, StructuredLookup } from '../types/capabilities.types.js';
import { createSilentLogger, type Logger } from '../observability/logger.js';
import { extractCourseCode } from './course-code.js';
import type { CatalogData } from './catalog-data.js';

export const CATALOG_SCHEMA_URL = new URL('../../data/schema.sql', import.meta.url);

export const CATALOG_TABLES = ['programs', 'prerequisites', 'deadlines', 'campus_resources', 'faqs'] as const;
export type CatalogTable = typeof CATALOG_TABLES[number];

export interface CatalogStoreOptions {
  /** Records returned per query */
  readonly maxResults?: number;
  readonly logger?: Logger;
}

export const DEFAULT_MAX_RESULTS = 5;

const SCORES: Readonly<Record<CatalogTable, number>> = {
  faqs: 0.9,
  prerequisites: 0.8,
  programs: 0.7,
  deadlines: 0.7,
  campus_resources: 0.7,
};

const STOP_WORDS: ReadonlySet<string> = new Set([
  'about', 'and', 'are', 'can', 'does', 'for', 'from', 'have', 'how', 'info', 'information',
  'many', 'need', 'tell', 'that', 'the', 'there', 'this', 'what', 'when', 'where', 'which',
  'who', 'why', 'will', 'with', 'you', 'your',
]);

// ============ Row Schemas ============

const nullableText = z.string().nullable();

const FaqRow = z.object({
  faq_id: z.number(),
  question: z.string(),
  answer: z.string(),
  category: nullableText,
});

const CourseRow = z.object({
  prereq_id: z.number(),
  course_code: z.string(),
  course_name: z.string(),
  department: nullableText,
  prerequisite_courses: nullableText,
  corequisite_courses: nullableText,
  description: nullableText,
  units: z.number().nullable(),
});

const ProgramRow = z.object({
  program_id: z.number(),
  program_name: z.string(),
  degree_type: z.string(),
  department: z.string(),
  description: nullableText,
  website_url: nullableText,
});

const DeadlineRow = z.object({
  deadline_id: z.number(),
  semester: z.string(),
  deadline_type: z.string(),
  deadline_date: z.string(),
  description: nullableText,
  applies_to: nullableText,
});

const ResourceRow = z.object({
  resource_id: z.number(),
  resource_name: z.string(),
  category: z.string(),
  description: nullableText,
  building: nullableText,
  room_number: nullableText,
  phone: nullableText,
  email: nullableText,
  hours: nullableText,
  website_url: nullableText,
});

const CountRow = z.object({ count: z.number() });

interface KeywordSearch<T> {
  readonly table: Exclude<CatalogTable, 'faqs'>;
  readonly idColumn: string;
  readonly columns: ReadonlyArray<string>;
  readonly row: z.ZodType<T>;
  readonly id: (row: T) => number;
  readonly toRecord: (row: T) => LookupRecord;
}

// ============ Record Builders ============

function fields(values: Record<string, string | number | null | undefined>): Readonly<Record<string, string>> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== null && value !== undefined && String(value).length > 0) {
      result[key] = String(value);
    }
  }
  return result;
}

function score(table: CatalogTable): string {
  return SCORES[table].toFixed(2);
}

function faqRecord(row: z.infer<typeof FaqRow>): LookupRecord {
  return {
    fields: fields({
      source: 'faqs',
      category: row.category?.toLowerCase() ?? 'general',
      score: score('faqs'),
      question: row.question,
      answer: row.answer,
      content: `Q: ${row.question}\nA: ${row.answer}`,
    }),
  };
}

function courseRecord(row: z.infer<typeof CourseRow>): LookupRecord {
  const prerequisites = row.prerequisite_courses || 'None';
  const corequisites = row.corequisite_courses ? ` Corequisites: ${row.corequisite_courses}.` : '';
  const description = row.description ? ` ${row.description}` : '';

  return {
    fields: fields({
      source: 'prerequisites',
      category: 'academics',
      score: score('prerequisites'),
      course_code: row.course_code,
      course_name: row.course_name,
      department: row.department,
      prerequisites,
      corequisites: row.corequisite_courses,
      units: row.units,
      content: `${row.course_code} - ${row.course_name}: Prerequisites: ${prerequisites}.${corequisites}${description}`,
    }),
  };
}

function programRecord(row: z.infer<typeof ProgramRow>): LookupRecord {
  return {
    fields: fields({
      source: 'programs',
      category: 'academics',
      score: score('programs'),
      program_name: row.program_name,
      degree_type: row.degree_type,
      department: row.department,
      website_url: row.website_url,
      content: `${row.program_name} (${row.degree_type}), ${row.department}: ${row.description ?? ''}`.trimEnd(),
    }),
  };
}

function deadlineRecord(row: z.infer<typeof DeadlineRow>): LookupRecord {
  const audience = row.applies_to ? ` (${row.applies_to})` : '';
  const description = row.description ? `. ${row.description}` : '';

  return {
    fields: fields({
      source: 'deadlines',
      category: 'deadlines',
      score: score('deadlines'),
      semester: row.semester,
      deadline_type: row.deadline_type,
      deadline_date: row.deadline_date,
      applies_to: row.applies_to,
      content: `${row.semester} ${row.deadline_type} deadline${audience}: ${row.deadline_date}${description}`,
    }),
  };
}

function resourceRecord(row: z.infer<typeof ResourceRow>): LookupRecord {
  const location = [row.building, row.room_number ? `Room ${row.room_number}` : null]
    .filter((part): part is string => Boolean(part))
    .join(', ');
  const details = [
    location ? `Location: ${location}` : null,
    row.hours ? `Hours: ${row.hours}` : null,
    row.phone ? `Phone: ${row.phone}` : null,
    row.email ? `Email: ${row.email}` : null,
    row.website_url ? `Website: ${row.website_url}` : null,
  ].filter((part): part is string => part !== null);

  return {
    fields: fields({
      source: 'campus_resources',
      category: row.category.toLowerCase(),
      score: score('campus_resources'),
      resource_name: row.resource_name,
      location,
      hours: row.hours,
      phone: row.phone,
      email: row.email,
      website_url: row.website_url,
      content: [`${row.resource_name}: ${row.description ?? ''}`.trimEnd(), ...details].join('\n'),
    }),
  };
}

/**
 * Words of a query worth matching, lower-cased and de-duplicated.
 */
export function extractKeywords(query: string): string[] {
  const words = query
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter(word => word.length >= 3 && !STOP_WORDS.has(word));
  return [...new Set(words)];
}

/**
 * Read-only lookup over a seeded catalog database.
 *
 * @example
 * ```typescript
 * const store = SqliteCatalogStore.open('./data/catalog.db');
 * const response = await store.search('CMPE 259 prerequisites');
 * ```
 */
export class SqliteCatalogStore implements StructuredLookup {
  private readonly maxResults: number;
  private readonly logger: Logger;
  private readonly keywordSearches: ReadonlyArray<(keyword: string, limit: number) => Array<[string, LookupRecord]>>;

  constructor(private readonly db: Database.Database, options: CatalogStoreOptions = {}) {
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.logger = (options.logger ?? createSilentLogger()).child({ module: 'catalog.store' });
    this.keywordSearches = [
      this.keywordSearch({
        table: 'prerequisites',
        idColumn: 'prereq_id',
        columns: ['course_code', 'course_name', 'description'],
        row: CourseRow,
        id: row => row.prereq_id,
        toRecord: courseRecord,
      }),
      this.keywordSearch({
        table: 'programs',
        idColumn: 'program_id',
        columns: ['program_name', 'department', 'description'],
        row: ProgramRow,
        id: row => row.program_id,
        toRecord: programRecord,
      }),
      this.keywordSearch({
        table: 'deadlines',
        idColumn: 'deadline_id',
        columns: ['semester', 'deadline_type', 'description'],
        row: DeadlineRow,
        id: row => row.deadline_id,
        toRecord: deadlineRecord,
      }),
      this.keywordSearch({
        table: 'campus_resources',
        idColumn: 'resource_id',
        columns: ['resource_name', 'category', 'description'],
        row: ResourceRow,
        id: row => row.resource_id,
        toRecord: resourceRecord,
      }),
    ];
  }

  /**
   * Opens an existing catalog database read-only.
   */
  static open(path: string, options: CatalogStoreOptions = {}): SqliteCatalogStore {
    return new SqliteCatalogStore(new Database(path, { readonly: true, fileMustExist: true }), options);
  }

  async search(query: string): Promise<LookupResponse> {
    const courseCode = extractCourseCode(query);

    if (courseCode) {
      const record = this.lookupCourse(courseCode);
      this.logger.debug('Course lookup', { courseCode, found: record !== null });
      return record
        ? { found: true, records: [record], matchedCount: 1 }
        : { found: false, records: [], matchedCount: 0 };
    }

    const records = this.searchText(query);
    this.logger.debug('Catalog search', { query, matched: records.length });
    return { found: records.length > 0, records, matchedCount: records.length };
  }

  /**
   * The catalog row for an exact course code, spacing ignored.
   */
  lookupCourse(courseCode: string): LookupRecord | null {
    const row: unknown = this.db
      .prepare(`SELECT * FROM prerequisites WHERE UPPER(REPLACE(course_code, ' ', '')) = ?`)
      .get(courseCode.replace(/\s+/g, '').toUpperCase());

    return row === undefined ? null : courseRecord(CourseRow.parse(row));
  }

  /**
   * Row count per catalog table.
   */
  stats(): Record<CatalogTable, number> {
    const counts: Record<CatalogTable, number> = {
      programs: 0,
      prerequisites: 0,
      deadlines: 0,
      campus_resources: 0,
      faqs: 0,
    };
    for (const table of CATALOG_TABLES) {
      counts[table] = CountRow.parse(this.db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get()).count;
    }
    return counts;
  }

  close(): void {
    this.db.close();
  }

  // ============ Private Methods ============

  private searchText(query: string): LookupRecord[] {
    const keywords = extractKeywords(query);
    if (keywords.length === 0) {
      return [];
    }

    const seen = new Set<string>();
    const records: LookupRecord[] = [];
    const add = (key: string, record: LookupRecord): void => {
      if (!seen.has(key) && records.length < this.maxResults) {
        seen.add(key);
        records.push(record);
      }
    };

    for (const [key, record] of this.searchFaqs(keywords)) {
      add(key, record);
    }

    for (const search of this.keywordSearches) {
      for (const keyword of keywords) {
        if (records.length >= this.maxResults) {
          return records;
        }
        for (const [key, record] of search(keyword, this.maxResults - records.length)) {
          add(key, record);
        }
      }
    }

    return records;
  }

  private searchFaqs(keywords: ReadonlyArray<string>): Array<[string, LookupRecord]> {
    const match = keywords.map(keyword => `"${keyword}"`).join(' OR ');
    let rows: unknown[];

    try {
      rows = this.db.prepare(`
        SELECT f.faq_id, f.question, f.answer, f.category
        FROM faqs_fts
        JOIN faqs f ON f.faq_id = faqs_fts.rowid
        WHERE faqs_fts MATCH ?
        ORDER BY rank
        LIMIT ?
      `).all(match, this.maxResults);
    } catch (error) {
      this.logger.warn('Full-text search failed, using LIKE', { match }, error instanceof Error ? error : undefined);
      const conditions = keywords.map(() => '(LOWER(question) LIKE ? OR LOWER(answer) LIKE ?)').join(' OR ');
      const params = keywords.flatMap(keyword => [`%${keyword}%`, `%${keyword}%`]);
      rows = this.db
        .prepare(`SELECT faq_id, question, answer, category FROM faqs WHERE ${conditions} LIMIT ?`)
        .all(...params, this.maxResults);
    }

    return z.array(FaqRow).parse(rows).map(row => [`faqs:${row.faq_id}`, faqRecord(row)]);
  }

  private keywordSearch<T>(spec: KeywordSearch<T>): (keyword: string, limit: number) => Array<[string, LookupRecord]> {
    const conditions = spec.columns.map(column => `LOWER(${column}) LIKE ?`).join(' OR ');
    const statement = this.db.prepare(
      `SELECT * FROM ${spec.table} WHERE ${conditions} ORDER BY ${spec.idColumn} LIMIT ?`,
    );

    return (keyword, limit) => {
      const pattern = `%${keyword}%`;
      const rows = statement.all(...spec.columns.map(() => pattern), limit);
      return z.array(spec.row).parse(rows).map(row => [`${spec.table}:${spec.id(row)}`, spec.toRecord(row)]);
    };
  }
}

// ============ Seeding ============

export type SeedSummary = Record<CatalogTable, number>;

/**
 * Creates the catalog schema and replaces its contents with `data`.
 */
export function seedCatalog(db: Database.Database, data: CatalogData): SeedSummary {
  db.exec(readFileSync(CATALOG_SCHEMA_URL, 'utf-8'));

  const insertProgram = db.prepare(`
    INSERT INTO programs (program_name, degree_type, department, description, website_url)
    VALUES (?, ?, ?, ?, ?)
  `);
  const insertCourse = db.prepare(`
    INSERT INTO prerequisites
    (course_code, course_name, department, prerequisite_courses, corequisite_courses, description, units)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  const insertDeadline = db.prepare(`
    INSERT INTO deadlines (semester, deadline_type, deadline_date, description, applies_to)
    VALUES (?, ?, ?, ?, ?)
  `);
  const insertResource = db.prepare(`
    INSERT INTO campus_resources
    (resource_name, category, description, building, room_number, phone, email, hours, website_url)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const insertFaq = db.prepare(`
    INSERT INTO faqs (question, answer, category, keywords) VALUES (?, ?, ?, ?)
  `);

  const transaction = db.transaction((catalog: CatalogData) => {
    for (const table of CATALOG_TABLES) {
      db.prepare(`DELETE FROM ${table}`).run();
    }

    for (const program of catalog.programs) {
      insertProgram.run(
        program.programName,
        program.degreeType,
        program.department,
        program.description ?? null,
        program.websiteUrl ?? null,
      );
    }
    for (const course of catalog.courses) {
      insertCourse.run(
        course.courseCode,
        course.courseName,
        course.department ?? null,
        course.prerequisites ?? null,
        course.corequisites ?? null,
        course.description ?? null,
        course.units ?? null,
      );
    }
    for (const deadline of catalog.deadlines) {
      insertDeadline.run(
        deadline.semester,
        deadline.deadlineType,
        deadline.deadlineDate,
        deadline.description ?? null,
        deadline.appliesTo ?? null,
      );
    }
    for (const resource of catalog.resources) {
      insertResource.run(
        resource.resourceName,
        resource.category,
        resource.description ?? null,
        resource.building ?? null,
        resource.roomNumber ?? null,
        resource.phone ?? null,
        resource.email ?? null,
        resource.hours ?? null,
        resource.websiteUrl ?? null,
      );
    }
    for (const faq of catalog.faqs) {
      insertFaq.run(faq.question, faq.answer, faq.category ?? null, faq.keywords ?? null);
    }
  });

  transaction(data);

  return {
    programs: data.programs.length,
    prerequisites: data.courses.length,
    deadlines: data.deadlines.length,
    campus_resources: data.resources.length,
    faqs: data.faqs.length,
  };
}

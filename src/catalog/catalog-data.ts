/**
 * @fileoverview Shape of the JSON catalog the SQLite store is seeded from.
 *
 * @module campus-guide/catalog/catalog-data
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';

const optionalText = z.string().nullable().optional();

export const ProgramSchema = z.object({
  programName: z.string().min(1),
  degreeType: z.string().min(1),
  department: z.string().min(1),
  description: optionalText,
  websiteUrl: optionalText,
});

export const CourseSchema = z.object({
  courseCode: z.string().regex(/^[A-Z]{2,4} \d{1,3}[A-Z]?$/, 'Course codes look like "CMPE 259"'),
  courseName: z.string().min(1),
  department: optionalText,
  prerequisites: optionalText,
  corequisites: optionalText,
  description: optionalText,
  units: z.number().int().positive().nullable().optional(),
});

export const DeadlineSchema = z.object({
  semester: z.string().min(1),
  deadlineType: z.string().min(1),
  deadlineDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates are YYYY-MM-DD'),
  description: optionalText,
  appliesTo: optionalText,
});

export const ResourceSchema = z.object({
  resourceName: z.string().min(1),
  category: z.string().min(1),
  description: optionalText,
  building: optionalText,
  roomNumber: optionalText,
  phone: optionalText,
  email: optionalText,
  hours: optionalText,
  websiteUrl: optionalText,
});

export const FaqSchema = z.object({
  question: z.string().min(1),
  answer: z.string().min(1),
  category: optionalText,
  keywords: optionalText,
});

export const CatalogDataSchema = z.object({
  programs: z.array(ProgramSchema).default([]),
  courses: z.array(CourseSchema).default([]),
  deadlines: z.array(DeadlineSchema).default([]),
  resources: z.array(ResourceSchema).default([]),
  faqs: z.array(FaqSchema).default([]),
});

export type CatalogData = z.infer<typeof CatalogDataSchema>;
export type ProgramEntry = z.infer<typeof ProgramSchema>;
export type CourseEntry = z.infer<typeof CourseSchema>;
export type DeadlineEntry = z.infer<typeof DeadlineSchema>;
export type ResourceEntry = z.infer<typeof ResourceSchema>;
export type FaqEntry = z.infer<typeof FaqSchema>;

/**
 * Catalog bundled with the package.
 */
export const DEFAULT_CATALOG_DATA_PATH = fileURLToPath(new URL('../../data/catalog.json', import.meta.url));

export function parseCatalogData(raw: unknown): CatalogData {
  const parsed = CatalogDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid catalog data: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export async function loadCatalogData(path: string = DEFAULT_CATALOG_DATA_PATH): Promise<CatalogData> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read catalog data from ${path}: ${errorMessage(error)}`);
  }
  return parseCatalogData(raw);
}

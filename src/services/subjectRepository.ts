import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Db } from './database';
import { Subject, SubjectId } from '../types';
import { logger } from '../utils/logger';

const SUBJECTS_PATH = path.resolve(__dirname, '..', '..', 'data', 'subjects.json');

const subjectCatalogSchema = z.array(
  z.object({
    category: z.string().min(1),
    subjects: z.array(
      z.object({
        id: z.string().regex(/^[a-z0-9-]+$/),
        name: z.string().min(1),
        slotMinutes: z.number().int().positive().optional(),
      })
    ),
  })
);

export type SubjectCatalog = z.infer<typeof subjectCatalogSchema>;

interface SubjectRow {
  id: string;
  name: string;
  category: string;
  sort_order: number;
  slot_minutes: number | null;
}

export interface SubjectGroup {
  category: string;
  subjects: Subject[];
}

function toSubject(row: SubjectRow): Subject {
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    sortOrder: row.sort_order,
    slotMinutes: row.slot_minutes,
  };
}

export function loadSubjectCatalog(file: string = SUBJECTS_PATH): SubjectCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return subjectCatalogSchema.parse(raw);
}

/**
 * Group an ordered subject list by consecutive category
 */
export function groupSubjects(subjects: Subject[]): SubjectGroup[] {
  const groups: SubjectGroup[] = [];
  for (const subject of subjects) {
    const current = groups[groups.length - 1];
    if (current && current.category === subject.category) {
      current.subjects.push(subject);
    } else {
      groups.push({ category: subject.category, subjects: [subject] });
    }
  }
  return groups;
}

export class SubjectRepository {
  constructor(private readonly db: Db) {}

  list(): Subject[] {
    return this.db
      .prepare<[], SubjectRow>('SELECT * FROM subjects ORDER BY sort_order')
      .all()
      .map(toSubject);
  }

  get(id: SubjectId): Subject | null {
    const row = this.db.prepare<[string], SubjectRow>('SELECT * FROM subjects WHERE id = ?').get(id);
    return row ? toSubject(row) : null;
  }

  /**
   * Upsert the catalogue; display order follows file order
   */
  ensureSeeded(catalog: SubjectCatalog = loadSubjectCatalog()): number {
    const upsert = this.db.prepare<[string, string, string, number, number | null]>(`
      INSERT INTO subjects (id, name, category, sort_order, slot_minutes)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT (id) DO UPDATE SET
        name = excluded.name,
        category = excluded.category,
        sort_order = excluded.sort_order,
        slot_minutes = excluded.slot_minutes
    `);

    const seed = this.db.transaction((groups: SubjectCatalog) => {
      let order = 1;
      for (const group of groups) {
        for (const subject of group.subjects) {
          upsert.run(subject.id, subject.name, group.category, order, subject.slotMinutes ?? null);
          order++;
        }
      }
      return order - 1;
    });

    const count = seed(catalog);
    logger.debug('Subject catalogue seeded', { count });
    return count;
  }
}

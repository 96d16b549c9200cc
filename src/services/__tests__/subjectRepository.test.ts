import { SubjectRepository, groupSubjects, loadSubjectCatalog } from '../subjectRepository';
import { openDatabase } from '../database';

describe('SubjectRepository', () => {
  it('should seed the catalog in file order and stay idempotent', () => {
    const db = openDatabase(':memory:');
    const subjects = new SubjectRepository(db);
    const catalog = loadSubjectCatalog();
    const total = catalog.reduce((sum, group) => sum + group.subjects.length, 0);

    expect(subjects.ensureSeeded(catalog)).toBe(total);
    expect(subjects.ensureSeeded(catalog)).toBe(total);
    expect(subjects.list()).toHaveLength(total);
    expect(subjects.list()[0]).toEqual({
      id: 'integrated-math-1',
      name: 'Integrated Math 1',
      category: 'Math',
      sortOrder: 1,
      slotMinutes: null,
    });
    expect(subjects.get('ap-seminar')?.slotMinutes).toBe(60);
    expect(subjects.get('knitting')).toBeNull();
    db.close();
  });

  it('should pick up renamed subjects on reseed', () => {
    const db = openDatabase(':memory:');
    const subjects = new SubjectRepository(db);
    subjects.ensureSeeded([{ category: 'Math', subjects: [{ id: 'algebra', name: 'Algebra' }] }]);
    subjects.ensureSeeded([{ category: 'Math', subjects: [{ id: 'algebra', name: 'Algebra I', slotMinutes: 45 }] }]);

    expect(subjects.get('algebra')).toEqual({
      id: 'algebra',
      name: 'Algebra I',
      category: 'Math',
      sortOrder: 1,
      slotMinutes: 45,
    });
    db.close();
  });
});

describe('groupSubjects', () => {
  it('should group consecutive subjects by category', () => {
    const groups = groupSubjects([
      { id: 'a', name: 'A', category: 'Math', sortOrder: 1, slotMinutes: null },
      { id: 'b', name: 'B', category: 'Math', sortOrder: 2, slotMinutes: null },
      { id: 'c', name: 'C', category: 'Science', sortOrder: 3, slotMinutes: null },
    ]);
    expect(groups.map((group) => [group.category, group.subjects.map((s) => s.id)])).toEqual([
      ['Math', ['a', 'b']],
      ['Science', ['c']],
    ]);
  });
});

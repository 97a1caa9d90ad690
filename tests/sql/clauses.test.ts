/**
 * School SQL Guard - Clause Helper Tests
 */

import { describe, it, expect } from '@jest/globals';

import {
  conjuncts,
  findTopLevelWhere,
  insertedRow,
  parseComparison,
  qualifierMap,
  setAssignments,
  tableReferences,
} from '../../src/sql/clauses.js';
import { tokenize, type Token } from '../../src/sql/lexer.js';

const text = (parts: Token[][]): string[] => parts.map((part) => part.map((token) => token.value).join(' '));

// =============================================================================
// Table References
// =============================================================================

describe('tableReferences', () => {
  it('should read FROM and JOIN tables with aliases', () => {
    const sql =
      'SELECT s.FullName FROM Students s JOIN Enrollments AS e ON s.StudentID = e.StudentID';

    expect(tableReferences(tokenize(sql))).toEqual([
      { table: 'Students', alias: 's', depth: 0 },
      { table: 'Enrollments', alias: 'e', depth: 0 },
    ]);
  });

  it('should read comma-separated FROM lists', () => {
    expect(tableReferences(tokenize('SELECT * FROM Students, Classes c WHERE 1 = 1'))).toEqual([
      { table: 'Students', depth: 0 },
      { table: 'Classes', alias: 'c', depth: 0 },
    ]);
  });

  it('should drop a schema prefix', () => {
    expect(tableReferences(tokenize('SELECT * FROM public.Students'))).toEqual([{ table: 'Students', depth: 0 }]);
  });

  it('should report the depth of subquery tables', () => {
    const sql = 'SELECT * FROM Classes WHERE ClassID IN (SELECT ClassID FROM Enrollments)';

    expect(tableReferences(tokenize(sql))).toEqual([
      { table: 'Classes', depth: 0 },
      { table: 'Enrollments', depth: 1 },
    ]);
  });

  it('should read UPDATE and INSERT targets', () => {
    expect(tableReferences(tokenize("UPDATE Classes SET Room = '101'"))).toEqual([{ table: 'Classes', depth: 0 }]);
    expect(tableReferences(tokenize('INSERT INTO Enrollments (StudentID) VALUES (1)'))).toEqual([
      { table: 'Enrollments', depth: 0 },
    ]);
  });
});

describe('qualifierMap', () => {
  it('should map table names and aliases case-insensitively', () => {
    const map = qualifierMap([
      { table: 'Students', alias: 's', depth: 0 },
      { table: 'Classes', depth: 0 },
    ]);

    expect(map.get('s')).toBe('Students');
    expect(map.get('students')).toBe('Students');
    expect(map.get('classes')).toBe('Classes');
    expect(map.get('c')).toBeUndefined();
  });
});

// =============================================================================
// WHERE Clause
// =============================================================================

describe('findTopLevelWhere', () => {
  it('should report the insertion point before ORDER BY', () => {
    expect(findTopLevelWhere(tokenize('SELECT * FROM Students ORDER BY FullName'))).toEqual({
      kind: 'none',
      insertAt: 23,
    });
  });

  it('should report the statement end when nothing follows the tables', () => {
    expect(findTopLevelWhere(tokenize('SELECT * FROM Students'))).toEqual({ kind: 'none', insertAt: 22 });
  });

  it('should locate the clause span up to a closing clause', () => {
    const sql = "SELECT * FROM t WHERE a = 1 AND b = 'x' LIMIT 5";
    const location = findTopLevelWhere(tokenize(sql));

    expect(location.kind).toBe('found');
    if (location.kind === 'found') {
      expect(sql.slice(location.start, location.end)).toBe("a = 1 AND b = 'x'");
    }
  });

  it('should ignore WHERE inside a string literal or subquery', () => {
    const literal = findTopLevelWhere(tokenize("SELECT * FROM t WHERE note = 'WHERE'"));
    const sql = 'SELECT * FROM t WHERE id IN (SELECT id FROM u WHERE x = 1)';
    const nested = findTopLevelWhere(tokenize(sql));

    expect(literal.kind).toBe('found');
    expect(nested.kind).toBe('found');
    if (nested.kind === 'found') {
      expect(sql.slice(nested.start, nested.end)).toBe('id IN (SELECT id FROM u WHERE x = 1)');
    }
  });

  it('should report ambiguous shapes', () => {
    expect(findTopLevelWhere(tokenize('SELECT a FROM t UNION SELECT b FROM u'))).toEqual({
      kind: 'ambiguous',
      reason: 'compound statement',
    });
    expect(findTopLevelWhere(tokenize('SELECT * FROM t WHERE'))).toEqual({
      kind: 'ambiguous',
      reason: 'empty WHERE clause',
    });
    expect(findTopLevelWhere(tokenize('SELECT * FROM t WHERE a = 1 WHERE b = 2'))).toEqual({
      kind: 'ambiguous',
      reason: 'more than one top-level WHERE',
    });
  });
});

describe('conjuncts', () => {
  it('should split on top-level AND and flatten parenthesized groups', () => {
    expect(text(conjuncts(tokenize('a = 1 AND (b = 2 AND c = 3)')))).toEqual(['a = 1', 'b = 2', 'c = 3']);
  });

  it('should keep an OR expression whole', () => {
    expect(text(conjuncts(tokenize('a = 1 OR b = 2')))).toEqual(['a = 1 OR b = 2']);
    expect(text(conjuncts(tokenize('(a = 1 OR b = 2) AND c = 3')))).toEqual(['a = 1 OR b = 2', 'c = 3']);
  });

  it('should not split the AND of BETWEEN', () => {
    expect(text(conjuncts(tokenize('x BETWEEN 1 AND 5 AND y = 2')))).toEqual(['x BETWEEN 1 AND 5', 'y = 2']);
  });
});

describe('parseComparison', () => {
  it('should read qualified comparisons against literals', () => {
    expect(parseComparison(tokenize("s.StudentID = '42'"))).toEqual({
      qualifier: 's',
      column: 'StudentID',
      value: '42',
    });
  });

  it('should accept the literal on the left', () => {
    expect(parseComparison(tokenize('42 = StudentID'))).toEqual({ column: 'StudentID', value: '42' });
  });

  it('should return null for anything but column = literal', () => {
    expect(parseComparison(tokenize('a > 1'))).toBeNull();
    expect(parseComparison(tokenize('a = b'))).toBeNull();
    expect(parseComparison(tokenize("a = 'x' OR b = 'y'"))).toBeNull();
  });
});

// =============================================================================
// INSERT Rows
// =============================================================================

describe('setAssignments', () => {
  it('should read literal and expression assignments', () => {
    const sql = "UPDATE Classes c SET Room = '101', c.TeacherID = 7, Seats = Seats + 1 WHERE ClassID = 5";

    expect(setAssignments(tokenize(sql))).toEqual([
      { column: 'Room', value: '101' },
      { qualifier: 'c', column: 'TeacherID', value: '7' },
      { column: 'Seats', value: null },
    ]);
  });

  it('should return null without a readable SET list', () => {
    expect(setAssignments(tokenize('DELETE FROM Classes'))).toBeNull();
    expect(setAssignments(tokenize('UPDATE Classes SET Room'))).toBeNull();
  });
});

describe('insertedRow', () => {
  it('should map columns to literal values', () => {
    const row = insertedRow(tokenize("INSERT INTO Enrollments (StudentID, ClassID) VALUES ('42', 7)"));

    expect(row === null ? null : Object.fromEntries(row)).toEqual({ studentid: '42', classid: '7' });
  });

  it('should map expressions to null', () => {
    const row = insertedRow(tokenize('INSERT INTO Enrollments (StudentID, ClassID) VALUES (NOW(), 7)'));

    expect(row === null ? null : Object.fromEntries(row)).toEqual({ studentid: null, classid: '7' });
  });

  it('should return null for multi-row inserts and missing column lists', () => {
    expect(insertedRow(tokenize('INSERT INTO Enrollments (StudentID, ClassID) VALUES (1, 2), (3, 4)'))).toBeNull();
    expect(insertedRow(tokenize('INSERT INTO Enrollments VALUES (1, 2)'))).toBeNull();
  });
});

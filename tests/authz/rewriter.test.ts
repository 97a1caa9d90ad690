/**
 * School SQL Guard - Statement Rewriter Tests
 */

import { describe, it, expect } from '@jest/globals';

import { rewrite } from '../../src/authz/rewriter.js';
import { RewriteError } from '../../src/utils/types.js';

const OWN_ROW = "StudentID = '42'";
const OWN_CLASSES = "TeacherID = '7'";

// =============================================================================
// Injection
// =============================================================================

describe('rewrite', () => {
  it('should add a WHERE clause to an unfiltered statement', () => {
    expect(rewrite('SELECT * FROM Students', OWN_ROW)).toBe("SELECT * FROM Students WHERE StudentID = '42'");
  });

  it('should keep a trailing semicolon after the injected clause', () => {
    expect(rewrite('SELECT * FROM Students;', OWN_ROW)).toBe("SELECT * FROM Students WHERE StudentID = '42';");
  });

  it('should insert the clause before ORDER BY and LIMIT', () => {
    expect(rewrite('SELECT FullName FROM Students ORDER BY FullName LIMIT 5', OWN_ROW)).toBe(
      "SELECT FullName FROM Students WHERE StudentID = '42' ORDER BY FullName LIMIT 5"
    );
  });

  it('should AND the predicate onto an existing clause', () => {
    expect(rewrite("UPDATE Classes SET Room='101' WHERE ClassID=5", "TeacherID='7'")).toBe(
      "UPDATE Classes SET Room='101' WHERE (ClassID=5) AND TeacherID='7'"
    );
  });

  it('should parenthesize an existing OR clause', () => {
    expect(rewrite("SELECT * FROM Classes WHERE Room = '101' OR Room = '102' ORDER BY ClassID", OWN_CLASSES)).toBe(
      "SELECT * FROM Classes WHERE (Room = '101' OR Room = '102') AND TeacherID = '7' ORDER BY ClassID"
    );
  });

  it('should leave subquery WHERE clauses alone', () => {
    expect(
      rewrite('SELECT * FROM Classes WHERE ClassID IN (SELECT ClassID FROM Courses WHERE Credits = 3)', OWN_CLASSES)
    ).toBe(
      "SELECT * FROM Classes WHERE (ClassID IN (SELECT ClassID FROM Courses WHERE Credits = 3)) AND TeacherID = '7'"
    );
  });

  it('should not mistake WHERE inside a string literal for the clause', () => {
    expect(rewrite("SELECT * FROM Students WHERE Major = 'x WHERE y'", OWN_ROW)).toBe(
      "SELECT * FROM Students WHERE (Major = 'x WHERE y') AND StudentID = '42'"
    );
  });
});

// =============================================================================
// Idempotence
// =============================================================================

describe('rewrite idempotence', () => {
  it.each([
    ['SELECT * FROM Students', OWN_ROW],
    ['SELECT * FROM Students;', OWN_ROW],
    ['SELECT FullName FROM Students ORDER BY FullName LIMIT 5', OWN_ROW],
    ["UPDATE Classes SET Room='101' WHERE ClassID=5", "TeacherID='7'"],
    ["SELECT * FROM Classes WHERE Room = '101' OR Room = '102'", OWN_CLASSES],
    ['SELECT s.FullName FROM Students s JOIN Enrollments e ON e.StudentID = s.StudentID', "s.StudentID = '42' AND e.StudentID = '42'"],
  ])('should not change %s a second time', (sql, predicate) => {
    const once = rewrite(sql, predicate);

    expect(rewrite(once, predicate)).toBe(once);
  });

  it('should recognize an equivalent condition already present', () => {
    expect(rewrite("SELECT * FROM Students WHERE StudentID='42'", OWN_ROW)).toBe(
      "SELECT * FROM Students WHERE StudentID='42'"
    );
    expect(rewrite("SELECT * FROM Students WHERE '42' = StudentID AND Major = 'Math'", OWN_ROW)).toBe(
      "SELECT * FROM Students WHERE '42' = StudentID AND Major = 'Math'"
    );
  });
});

// =============================================================================
// Refusals
// =============================================================================

describe('rewrite refusals', () => {
  it.each([
    ['a comment', "SELECT * FROM Students -- WHERE StudentID = '42'"],
    ['an ambiguous string escape', "SELECT * FROM Students WHERE Major = 'it\\'s'"],
    ['several statements', 'SELECT * FROM Students; SELECT * FROM Classes'],
    ['a set operation', 'SELECT FullName FROM Students UNION SELECT FullName FROM Teachers'],
    ['an empty WHERE clause', 'SELECT * FROM Students WHERE ORDER BY FullName'],
    ['an INSERT', "INSERT INTO Enrollments (StudentID) VALUES ('42')"],
  ])('should refuse %s', (_label, sql) => {
    expect(() => rewrite(sql, OWN_ROW)).toThrow(RewriteError);
  });

  it('should refuse an empty predicate', () => {
    expect(() => rewrite('SELECT * FROM Students', '  ')).toThrow('Scoping predicate is empty');
  });

  it('should name the ambiguity', () => {
    expect(() => rewrite('SELECT * FROM Students WHERE Major = 1 WHERE StudentID = 2', OWN_ROW)).toThrow(
      'WHERE clause boundary is ambiguous: more than one top-level WHERE'
    );
  });
});

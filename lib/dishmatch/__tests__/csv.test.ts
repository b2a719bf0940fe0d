/**
 * CSV Reader Tests
 */

import { DataShapeError } from '../errors';
import { parseCsv, requireColumns } from '../data/csv';

describe('parseCsv', () => {
  it('maps rows by header and tracks source lines', () => {
    const doc = parseCsv('user_id,recipe_id,rate\n1,101,1\n2,"102",-1\n\n');

    expect(doc.header).toEqual(['user_id', 'recipe_id', 'rate']);
    expect(doc.rows).toEqual([
      { user_id: '1', recipe_id: '101', rate: '1' },
      { user_id: '2', recipe_id: '102', rate: '-1' },
    ]);
    expect(doc.lines).toEqual([2, 3]);
  });

  it('keeps commas, newlines and doubled quotes inside quoted fields', () => {
    const doc = parseCsv('id,name\n1,"Soup, ""hot""\nand fresh"\n2,Bread');

    expect(doc.rows).toEqual([
      { id: '1', name: 'Soup, "hot"\nand fresh' },
      { id: '2', name: 'Bread' },
    ]);
  });

  it('reads CRLF line endings', () => {
    const doc = parseCsv('a,b\r\n1,2\r\n3,4\r\n');

    expect(doc.rows).toEqual([
      { a: '1', b: '2' },
      { a: '3', b: '4' },
    ]);
    expect(doc.lines).toEqual([2, 3]);
  });

  it('keeps a stray quote inside an unquoted field as text', () => {
    const doc = parseCsv('id,name,description\n1,pizza,a 12" pan pizza\n2,cake,"plain"\n', 'recipes.csv');

    expect(doc.rows).toEqual([
      { id: '1', name: 'pizza', description: 'a 12" pan pizza' },
      { id: '2', name: 'cake', description: 'plain' },
    ]);
  });

  it('strips a byte order mark', () => {
    expect(parseCsv('\uFEFFa,b\n1,2').header).toEqual(['a', 'b']);
  });

  it('rejects empty input', () => {
    expect(() => parseCsv('', 'ratings.csv')).toThrow('ratings.csv: file is empty');
  });

  it('rejects a row with the wrong field count', () => {
    expect(() => parseCsv('a,b\n1\n')).toThrow('csv: line 2 has 1 fields, expected 2');
  });

  it('rejects an unterminated quote', () => {
    expect(() => parseCsv('a\n"oops')).toThrow(DataShapeError);
    expect(() => parseCsv('a\n"oops')).toThrow(/^csv: /);
  });
});

describe('requireColumns', () => {
  it('names the missing columns', () => {
    const doc = parseCsv('user_id,recipe_id\n1,2');

    expect(() => requireColumns(doc, ['user_id', 'recipe_id', 'rate'], 'ratings.csv')).toThrow(
      'ratings.csv: missing column(s) rate'
    );
    expect(() => requireColumns(doc, ['user_id'], 'ratings.csv')).not.toThrow();
  });
});

import { parseYamlDocument, parseCsvRows, DocumentParseError } from '../documents.js';
import { parseProperties, formatProperties } from '../properties.js';

describe('parseYamlDocument', () => {
  it('parses a mapping', () => {
    expect(parseYamlDocument('Method: GET\nEndpoint: https://x.test\nStatus: 200\n', 'req.yaml')).toEqual({
      Method: 'GET',
      Endpoint: 'https://x.test',
      Status: 200,
    });
  });

  it('returns null for an empty document', () => {
    expect(parseYamlDocument('', 'empty.yaml')).toBeNull();
  });

  it('wraps syntax errors with the source name', () => {
    expect(() => parseYamlDocument('a: [1, 2', 'bad.yaml')).toThrow(DocumentParseError);
    expect(() => parseYamlDocument('a: [1, 2', 'bad.yaml')).toThrow(/^Invalid YAML in bad\.yaml: /);
  });
});

describe('parseCsvRows', () => {
  it('maps each row by the header names', () => {
    expect(parseCsvRows('user,age\nann,30\n bob , 41 \n', 'rows.csv')).toEqual([
      { user: 'ann', age: '30' },
      { user: 'bob', age: '41' },
    ]);
  });

  it('skips blank lines and a byte order mark', () => {
    expect(parseCsvRows('\uFEFFid\n1\n\n2\n', 'rows.csv')).toEqual([{ id: '1' }, { id: '2' }]);
  });

  it('returns no rows for an empty file', () => {
    expect(parseCsvRows('', 'rows.csv')).toEqual([]);
  });

  it('reports rows with the wrong number of columns', () => {
    expect(() => parseCsvRows('a,b\n1,2,3\n', 'rows.csv')).toThrow(/^Invalid CSV in rows\.csv: /);
  });
});

describe('properties', () => {
  it('parses key=value lines, skipping comments and blanks', () => {
    expect(parseProperties('# saved\n\ntoken = abc=def\nbroken line\nempty=\n')).toEqual({
      token: 'abc=def',
      empty: '',
    });
  });

  it('round-trips escaped characters', () => {
    const text = formatProperties({ path: 'C:\\tmp', note: 'a\nb' }, 'header');

    expect(text).toBe('# header\npath=C:\\\\tmp\nnote=a\\nb\n');
    expect(parseProperties(text)).toEqual({ path: 'C:\\tmp', note: 'a\nb' });
  });

  it('keeps whitespace that belongs to the value', () => {
    const text = formatProperties({ token: '  abc  ', tab: 'a\tb' });

    expect(text).toBe('token=\\ \\ abc  \ntab=a\\tb\n');
    expect(parseProperties(text)).toEqual({ token: '  abc  ', tab: 'a\tb' });
  });

  it('drops only the whitespace around the separator', () => {
    expect(parseProperties('  key  =   value \n')).toEqual({ key: 'value ' });
  });
});

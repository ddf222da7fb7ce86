import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { readResult, writeResult } from '../output';
import type { ApiEndpointRecord } from '../types';

const records: ApiEndpointRecord[] = [
  {
    url: 'https://go.servicem8.com/CalendarStoreRequest?s_cv=&s_auth=abc123',
    cookie: 'PHPSESSID=test-session',
    s_auth: 'abc123'
  }
];

describe('writeResult', () => {
  let dir: string;
  let resultPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'result-'));
    resultPath = join(dir, 'result.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the records with a three-space indent', () => {
    expect(writeResult(resultPath, records)).toBe(true);
    expect(readFileSync(resultPath, 'utf-8')).toBe(JSON.stringify(records, null, 3));
    expect(readFileSync(resultPath, 'utf-8')).toContain('\n   {\n      "url"');
  });

  it('writes an empty array for a failed run', () => {
    expect(writeResult(resultPath, null)).toBe(true);
    expect(readFileSync(resultPath, 'utf-8')).toBe('[]');
  });

  it('writes an empty array for a grouped result without endpoints', () => {
    writeResult(resultPath, { cookie: 'a=1', api_endpoints: [] });
    expect(readFileSync(resultPath, 'utf-8')).toBe('[]');
  });

  it('creates the parent directory', () => {
    const nested = join(dir, 'out', 'result.json');
    expect(writeResult(nested, records)).toBe(true);
    expect(readResult(nested)).toEqual(records);
  });

  it('reports failure when the path cannot be written', () => {
    expect(writeResult(dir, records)).toBe(false);
  });
});

describe('readResult', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'result-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads grouped results', () => {
    const grouped = { cookie: 'a=1', api_endpoints: [{ url: 'https://go.servicem8.com/x?s_auth=ff', s_auth: 'ff' }] };
    const file = join(dir, 'grouped.json');
    writeFileSync(file, JSON.stringify(grouped));

    expect(readResult(file)).toEqual(grouped);
  });

  it('rejects records with a non-hex token', () => {
    const file = join(dir, 'bad.json');
    writeFileSync(file, JSON.stringify([{ url: 'https://go.servicem8.com/x', cookie: '', s_auth: 'XYZ' }]));

    expect(readResult(file)).toBeNull();
  });

  it('returns null for a missing file', () => {
    expect(readResult(join(dir, 'missing.json'))).toBeNull();
  });
});

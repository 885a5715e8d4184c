import {
  extractRows,
  makeDetailUrl,
  makePdfUrl,
  normalizeRow,
  pick,
} from '@/modules/rows';
import { makeRawRow } from '../helpers/fakeUpstream';

const LIVE = 'https://www.bseindia.com/xml-data/corpfiling/AttachLive/';
const HISTORICAL = 'https://www.bseindia.com/xml-data/corpfiling/AttachHis/';

describe('extractRows (unit)', () => {
  const x = { NEWSID: 'x' };

  test.each([
    [{ Table: [x] }],
    [{ table: [x] }],
    [{ data: [x] }],
    [{ Data: [x] }],
    [{ d: { Table: [x] } }],
  ])('finds rows inside %j', (payload) => {
    expect(extractRows(payload)).toEqual([x]);
  });

  test('prefers envelope keys in priority order', () => {
    expect(extractRows({ data: ['second'], Table: ['first'] })).toEqual(['first']);
  });

  test('skips envelope keys that do not hold a list', () => {
    expect(extractRows({ Table: 'nope', data: [x] })).toEqual([x]);
  });

  test.each([
    [{ rows: [x] }],
    [{ d: { data: [x] } }],
    [{ d: [x] }],
    [[x]],
    ['Table'],
    [null],
    [42],
  ])('returns [] for unrecognized shape %j', (payload) => {
    expect(extractRows(payload)).toEqual([]);
  });
});

describe('pick (unit)', () => {
  test('first usable alias wins', () => {
    expect(pick({ A: null, B: '', C: 'c', D: 'd' }, 'A', 'B', 'C', 'D')).toBe('c');
  });

  test('stringifies numbers and booleans, keeps zero', () => {
    expect(pick({ A: 0 }, 'A')).toBe('0');
    expect(pick({ A: 532540 }, 'A')).toBe('532540');
    expect(pick({ A: false }, 'A')).toBe('false');
  });

  test('returns null when no alias is usable', () => {
    expect(pick({ A: { nested: true } }, 'A', 'B')).toBeNull();
  });
});

describe('makePdfUrl (unit)', () => {
  test('passes absolute attachment URLs through unchanged', () => {
    const url = 'HTTPS://cdn.example.com/a.pdf';
    expect(makePdfUrl({ ATTACHMENTNAME: url, PDFFLAG: '1' })).toBe(url);
  });

  test('flag "1" selects the historical path', () => {
    expect(makePdfUrl({ ATTACHMENTNAME: 'a.pdf', PDFFLAG: 1 })).toBe(`${HISTORICAL}a.pdf`);
    expect(makePdfUrl({ FILE: 'b.pdf', pdfflag: '1' })).toBe(`${HISTORICAL}b.pdf`);
  });

  test('any other flag selects the live path', () => {
    expect(makePdfUrl({ ATTACHMENTNAME: 'a.pdf', PDFFLAG: 0 })).toBe(`${LIVE}a.pdf`);
    expect(makePdfUrl({ ATTACHMENT: 'c.pdf' })).toBe(`${LIVE}c.pdf`);
    expect(makePdfUrl({ ATTACHMENTNAME: 'd.pdf', PDFFLAG: '2' })).toBe(`${LIVE}d.pdf`);
  });

  test('returns null without an attachment', () => {
    expect(makePdfUrl({ ATTACHMENTNAME: '', PDFFLAG: '1' })).toBeNull();
  });
});

describe('makeDetailUrl (unit)', () => {
  test('needs both the news id and the scrip code', () => {
    expect(makeDetailUrl({ NEWSID: 'abc-123', SCRIP_CD: ' 500325 ' })).toBe(
      'https://m.bseindia.com/MAnnDet.aspx?Form=STR&newsid=abc-123&scrpcd=500325'
    );
    expect(makeDetailUrl({ NEWSID: 'abc-123' })).toBeNull();
    expect(makeDetailUrl({ NEWSID: 'abc-123', SCRIP_CD: '   ' })).toBeNull();
    expect(makeDetailUrl({ scripcode: '500325' })).toBeNull();
  });
});

describe('normalizeRow (unit)', () => {
  test('maps the primary field names', () => {
    expect(normalizeRow(makeRawRow(1))).toEqual({
      datetime: '2025-01-01T10:00:00',
      scrip_code: '500001',
      scrip_name: 'Company 1',
      headline: 'Headline 1',
      category: 'Company Update',
      subcategory: null,
      news_id: 'news-1',
      pdf_url: `${LIVE}file-1.pdf`,
      detail_url: 'https://m.bseindia.com/MAnnDet.aspx?Form=STR&newsid=news-1&scrpcd=500001',
    });
  });

  test('maps alternate field names from other endpoint versions', () => {
    const row = normalizeRow({
      NEWS_DT: '01 Jan 2025 09:15',
      Scripcode: '532540',
      Scripname: 'Alt Co',
      HEADLINE: 'Alt headline',
      CATEGORY: 'Result',
      SUBCAT: 'Financial Results',
      newsid: 'n-9',
    });

    expect(row).toEqual({
      datetime: '01 Jan 2025 09:15',
      scrip_code: '532540',
      scrip_name: 'Alt Co',
      headline: 'Alt headline',
      category: 'Result',
      subcategory: 'Financial Results',
      news_id: 'n-9',
      pdf_url: null,
      detail_url: 'https://m.bseindia.com/MAnnDet.aspx?Form=STR&newsid=n-9&scrpcd=532540',
    });
  });

  test('absent fields become null', () => {
    const row = normalizeRow({});

    expect(Object.values(row).every((value) => value === null)).toBe(true);
  });
});

import { buildParamVariants } from '@/modules/paramVariants';

const input = {
  segment: 'C',
  submissionType: '0',
  fromDate: '01/01/2025',
  toDate: '02/01/2025',
  page: 3,
  search: 'tata',
  category: 'Board Meeting',
  subcategory: '',
};

describe('buildParamVariants (unit)', () => {
  test('returns the three field-naming guesses in order', () => {
    const [v1, v2, v3] = buildParamVariants(input);

    const base = {
      strCat: 'Board Meeting',
      strSubCat: '',
      strType: 'C',
      strFromDate: '01/01/2025',
      strToDate: '02/01/2025',
      strSearch: 'tata',
      strScrip: '',
      pageno: '3',
    };

    expect(v1).toEqual({ ...base, strIsXBRL: '0' });
    expect(v2).toEqual({ ...base, strAnnSubmitType: '0' });
    expect(v3).toEqual({ ...base, strIsXBRL: '0', strPrevDate: '' });
  });

  test('fills upstream defaults for blank filters', () => {
    const [v1] = buildParamVariants({
      submissionType: '1',
      fromDate: '01/01/2025',
      toDate: '01/01/2025',
      page: 1,
      segment: '',
    });

    expect(v1.strCat).toBe('-1');
    expect(v1.strType).toBe('C');
    expect(v1.strSearch).toBe('');
    expect(v1.strIsXBRL).toBe('1');
  });
});

import { describe, it, expect } from 'vitest';
import { appendParams, encodeValue, joinList } from '../params.js';

describe('Wire parameters', () => {
  it('encodes booleans as 1/0', () => {
    expect(encodeValue(true)).toBe('1');
    expect(encodeValue(false)).toBe('0');
    expect(encodeValue(25)).toBe('25');
  });

  it('drops absent values and appends embedded data', () => {
    const search = appendParams(
      new URLSearchParams(),
      { SurveyID: 'SV_1', Limit: undefined, PanelID: null, Labels: true },
      { region: 'EU', tier: 2 }
    );
    expect(search.toString()).toBe('SurveyID=SV_1&Labels=1&ED%5Bregion%5D=EU&ED%5Btier%5D=2');
  });

  it('joins lists with commas and omits empty ones', () => {
    expect(joinList(['QID1', 'QID2'])).toBe('QID1,QID2');
    expect(joinList([])).toBeUndefined();
    expect(joinList(undefined)).toBeUndefined();
  });
});

import { describe, expect, it } from 'vitest';
import type { RawRecord } from '../ingress/rawRecord.js';
import { dedupeByUniqueKey } from '../normalize/dedupe.js';
import { sampleRawServiceRequest } from './fixtures.js';

describe('dedupeByUniqueKey', () => {
  it('keeps exactly one row per unique key', () => {
    const result = dedupeByUniqueKey([
      sampleRawServiceRequest({ 'Unique Key': '100' }),
      sampleRawServiceRequest({ 'Unique Key': '100' })
    ]);

    expect(result.survivors).toHaveLength(1);
    expect(result.survivors[0]?.uniqueKey).toBe('100');
    expect(result.duplicates).toEqual([{ uniqueKey: '100', keptRowNumber: 1, droppedRowNumbers: [2] }]);
  });

  it('picks the same survivor whatever the input order', () => {
    const loud = sampleRawServiceRequest({ Descriptor: 'Loud Music/Party' });
    const banging = sampleRawServiceRequest({ Descriptor: 'Banging/Pounding' });

    const forward = dedupeByUniqueKey([loud, banging]);
    const backward = dedupeByUniqueKey([banging, loud]);

    expect(forward.survivors[0]?.record.Descriptor).toBe('Banging/Pounding');
    expect(backward.survivors[0]?.record.Descriptor).toBe('Banging/Pounding');
    expect(forward.survivors[0]?.rowNumber).toBe(2);
    expect(backward.survivors[0]?.rowNumber).toBe(1);
  });

  it('matches keys after trimming and reports rows without one', () => {
    const result = dedupeByUniqueKey([
      sampleRawServiceRequest({ 'Unique Key': '200' }),
      sampleRawServiceRequest({ 'Unique Key': '  ' }),
      sampleRawServiceRequest({ 'Unique Key': ' 200 ' }),
      sampleRawServiceRequest({ 'Unique Key': null })
    ]);

    expect(result.survivors.map((survivor) => survivor.uniqueKey)).toEqual(['200']);
    expect(result.missingKeyRowNumbers).toEqual([2, 4]);
  });

  it('returns groups in order of first appearance', () => {
    const result = dedupeByUniqueKey([
      sampleRawServiceRequest({ 'Unique Key': '300' }),
      sampleRawServiceRequest({ 'Unique Key': '100' }),
      sampleRawServiceRequest({ 'Unique Key': '300' }),
      sampleRawServiceRequest({ 'Unique Key': '200' })
    ]);

    expect(result.survivors.map((survivor) => survivor.uniqueKey)).toEqual(['300', '100', '200']);
  });

  it('lets preferred rows win over a smaller fingerprint', () => {
    const late = sampleRawServiceRequest({ 'Created Date': '03/15/2015 10:00:00 AM' });
    const early = sampleRawServiceRequest({ 'Created Date': '03/15/2009 10:00:00 AM' });
    const prefer = (record: RawRecord) => record['Created Date'] !== '03/15/2009 10:00:00 AM';

    const result = dedupeByUniqueKey([late, early], { prefer });

    expect(dedupeByUniqueKey([late, early]).survivors[0]?.rowNumber).toBe(2);
    expect(result.survivors[0]?.record['Created Date']).toBe('03/15/2015 10:00:00 AM');
    expect(result.duplicates).toEqual([{ uniqueKey: '100', keptRowNumber: 1, droppedRowNumbers: [2] }]);
  });
});

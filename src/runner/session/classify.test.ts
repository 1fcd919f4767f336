import { describe, expect, it } from 'vitest';

import {
  BASE_FAILURE_MARKERS,
  classify,
  failureMarkerSet,
  transcriptLines,
} from './classify';

const LOAD = 'LoadPackage("semigroups", false);';

describe('classify', () => {
  it('passes a clean transcript', () => {
    expect(classify('ok\n')).toEqual({
      outcome: 'pass',
      emptyWarning: false,
      markers: [],
    });
  });

  it('fails on an error marker line', () => {
    const out = classify('Step 1 ok\n#E bad input\nStep 2 ok\n');
    expect(out.outcome).toBe('fail');
    expect(out.markers).toEqual(['#E ']);
  });

  it('matches case-sensitively and literally', () => {
    expect(classify('no error here\n').outcome).toBe('pass');
    expect(classify('#Ebad\n').outcome).toBe('pass');
    expect(classify('Syntax Error: ;\n').markers).toEqual(['Error']);
    expect(classify('brk> quit;\n').markers).toEqual(['brk>']);
    expect(classify('########> Diff in foo.tst\n').markers).toEqual([
      '########> Diff',
    ]);
  });

  it('reports found markers in marker-set order', () => {
    expect(classify('Error\n# WARNING\n').markers).toEqual(['# WARNING', 'Error']);
  });

  it('flags an empty transcript without failing it', () => {
    expect(classify('')).toEqual({
      outcome: 'pass',
      emptyWarning: true,
      markers: [],
    });
  });

  it('fails when loading the package returns fail', () => {
    const markers = failureMarkerSet(LOAD);
    expect(markers).toHaveLength(BASE_FAILURE_MARKERS.length + 1);
    expect(classify(`${LOAD}\nfail\n`, markers).markers).toEqual([
      `${LOAD}\nfail`,
    ]);
    expect(classify(`${LOAD}\ntrue\n`, markers).outcome).toBe('pass');
    // "fail" elsewhere is not a marker
    expect(classify('fail\n', markers).outcome).toBe('pass');
  });
});

describe('transcriptLines', () => {
  it('splits on newlines, drops the final empty line and trailing blanks', () => {
    expect(transcriptLines('a  \r\nb\n')).toEqual(['a', 'b']);
    expect(transcriptLines('a\n\nb')).toEqual(['a', '', 'b']);
    expect(transcriptLines('')).toEqual([]);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { extractIncludes, extractIncludesFromFile, decodeLenient } from './include-extractor.js';
import { ScanError } from '../errors/index.js';
import { createTestDir, cleanupTestDir, writeTree } from '../test/helpers/fixture-tree.js';

describe('extractIncludes', () => {
  it('should capture quoted and angle-bracket targets in order', () => {
    const code = [
      '#include <stdio.h>',
      '#include "config.h"',
      '#include <vector>',
      '',
      'int main(void) { return 0; }',
    ].join('\n');

    expect(extractIncludes(code)).toEqual(['stdio', 'config', 'vector']);
  });

  it('should reduce targets to their base name', () => {
    const code = '#include "drivers/uart/uart.h"\n#include <sys/types.h>\n';

    expect(extractIncludes(code)).toEqual(['uart', 'types']);
  });

  it('should accept any whitespace after the directive', () => {
    expect(extractIncludes('#include\t"a.h"\n#include   <b.h>')).toEqual(['a', 'b']);
  });

  it('should accept indented directives and trailing comments', () => {
    const code = '  #include "a.h" // needs "b.h" too\n';

    expect(extractIncludes(code)).toEqual(['a']);
  });

  it('should not match a directive without whitespace or delimiters', () => {
    expect(extractIncludes('#include"a.h"\n#include a.h\n#import "b.h"')).toEqual([]);
  });

  it('should not match a target split across lines', () => {
    expect(extractIncludes('#include "a\n.h"')).toEqual([]);
  });

  it('should keep duplicates', () => {
    expect(extractIncludes('#include "a.h"\n#include "a.h"\n')).toEqual(['a', 'a']);
  });

  it('should return an empty array when there are no includes', () => {
    expect(extractIncludes('int x = 1;\n')).toEqual([]);
  });
});

describe('decodeLenient', () => {
  it('should replace invalid UTF-8 instead of failing', () => {
    const bytes = new Uint8Array([0x61, 0xff, 0xfe, 0x62]);

    expect(decodeLenient(bytes)).toBe('a\uFFFD\uFFFDb');
  });
});

describe('extractIncludesFromFile', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await cleanupTestDir(testDir);
  });

  it('should read includes from disk', async () => {
    await writeTree(testDir, { 'a.h': '#include "b.h"\n' });

    expect(extractIncludesFromFile(path.join(testDir, 'a.h'))).toEqual(['b']);
  });

  it('should tolerate malformed bytes around directives', async () => {
    const prefix = Buffer.from([0xc3, 0x28, 0x0a]);
    const body = Buffer.from('#include "b.h"\n\xff\n#include <c.h>\n', 'latin1');
    await writeTree(testDir, { 'a.c': Buffer.concat([prefix, body]) });

    expect(extractIncludesFromFile(path.join(testDir, 'a.c'))).toEqual(['b', 'c']);
  });

  it('should throw ScanError for a missing file', () => {
    expect(() => extractIncludesFromFile(path.join(testDir, 'gone.h'))).toThrow(ScanError);
  });
});

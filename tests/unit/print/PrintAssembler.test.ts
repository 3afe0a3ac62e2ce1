/**
 * @file PrintAssembler.test.ts
 * @module tests/unit/print/PrintAssembler
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Unit tests for merging cached pages into the print document.
 */

import { existsSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import * as cheerio from 'cheerio';
import { PrintAssembler } from '../../../src/print/PrintAssembler.js';
import { MissingCachedPagesError, NoReferencesError } from '../../../src/shared/errors.js';
import { makePage, makeReferences, makeTempDir } from '../../setup.js';

describe('PrintAssembler', () => {
  let cacheDir: string;
  let outputDir: string;

  beforeEach(() => {
    cacheDir = makeTempDir('print-cache');
    outputDir = makeTempDir('print-output');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const dir of [cacheDir, outputDir]) {
      if (existsSync(dir)) {
        rmSync(dir, { recursive: true, force: true });
      }
    }
  });

  function cache(name: string, body: string): void {
    writeFileSync(join(cacheDir, `${name}.html`), makePage(name, body));
  }

  describe('checkCache', () => {
    it('should list missing names in canonical order', () => {
      cache('std::list', '<h1>std::list</h1>');
      const references = makeReferences(['std::vector::iterator', 'std::list', 'std::vector']);

      const missing = new PrintAssembler({ cacheDir }).checkCache(references);

      expect(missing).toEqual(['std::vector', 'std::vector::iterator']);
    });

    it('should treat a missing cache directory as empty', () => {
      const assembler = new PrintAssembler({ cacheDir: join(cacheDir, 'absent') });

      expect(assembler.checkCache(makeReferences(['std::sort']))).toEqual(['std::sort']);
    });

    it('should not count temporary files as cached pages', () => {
      writeFileSync(join(cacheDir, 'std::sort.html.4242.tmp'), 'partial');

      expect(new PrintAssembler({ cacheDir }).checkCache(makeReferences(['std::sort']))).toEqual(['std::sort']);
    });
  });

  describe('assemble', () => {
    it('should fail with the exact list of missing pages', () => {
      cache('std::list', '<h1>std::list</h1>');
      cache('std::map', '<h1>std::map</h1>');
      const references = makeReferences(['std::list', 'std::vector', 'std::sort']);

      let caught: unknown;
      try {
        new PrintAssembler({ cacheDir }).assemble(references);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MissingCachedPagesError);
      if (caught instanceof MissingCachedPagesError) {
        expect(caught.missing).toEqual(['std::sort', 'std::vector']);
        expect(caught.message).toBe(
          'Missing 2 required HTML file(s): std::sort.html, std::vector.html. Run "refbook fetch" first.'
        );
      }
    });

    it('should fail when there are no references', () => {
      expect(() => new PrintAssembler({ cacheDir }).assemble(new Map())).toThrow(NoReferencesError);
    });

    it('should merge pages in canonical order under the first page', () => {
      cache('std::vector::iterator', '<h1>std::vector::iterator</h1>');
      cache('std::vector', '<h1>std::vector</h1>');
      cache('std::list', '<h1>std::list</h1>');
      cache('std::map', '<h1>std::map</h1>');
      const references = makeReferences(['std::vector', 'std::vector::iterator', 'std::list']);

      const $ = cheerio.load(new PrintAssembler({ cacheDir, colored: true }).assemble(references));

      expect($('title').text()).toBe('std::list');
      expect($('h1').map((_, el) => $(el).text()).get()).toEqual([
        'std::list',
        'std::vector',
        'std::vector::iterator',
      ]);
      expect($('body > div').length).toBe(2);
      expect($('body > h1').text()).toBe('std::list');
    });

    it('should copy elements with their attributes and text', () => {
      cache('std::list', '<h1>std::list</h1>');
      cache('std::vector', '<p class="note" data-since="C++98">text <b>bold</b></p>tail');

      const $ = cheerio.load(
        new PrintAssembler({ cacheDir, colored: true }).assemble(makeReferences(['std::list', 'std::vector']))
      );

      expect($('body > div').html()).toBe('<p class="note" data-since="C++98">text <b>bold</b></p>tail');
    });

    it('should skip comments from appended pages', () => {
      cache('std::list', '<h1>std::list</h1>');
      cache('std::vector', '<!-- generated --><p>vector</p>');

      const $ = cheerio.load(
        new PrintAssembler({ cacheDir, colored: true }).assemble(makeReferences(['std::list', 'std::vector']))
      );

      expect($('body > div').html()).toBe('<p>vector</p>');
    });

    it('should skip nested comments from appended pages', () => {
      cache('std::list', '<h1>std::list</h1>');
      cache('std::vector', '<div><!-- inner --><p>kept<!-- deep --></p></div>');

      const $ = cheerio.load(
        new PrintAssembler({ cacheDir, colored: true }).assemble(makeReferences(['std::list', 'std::vector']))
      );

      expect($('body > div').html()).toBe('<div><p>kept</p></div>');
    });

    it('should keep highlighting in colored mode', () => {
      cache('std::list', '<h1>std::list</h1>');
      cache('std::vector', '<pre class="de1"><span class="kw1">return</span> 0;</pre>');

      const $ = cheerio.load(
        new PrintAssembler({ cacheDir, colored: true }).assemble(makeReferences(['std::list', 'std::vector']))
      );

      expect($('pre.de1').html()).toBe('<span class="kw1">return</span> 0;');
    });

    it('should flatten code blocks of every page in flattened mode', () => {
      cache('std::list', '<pre class="de1"><span class="kw1">int</span> a;</pre>');
      cache('std::vector', '<pre class="de1"><span class="kw1">return</span> 0;</pre><p><span>kept</span></p>');

      const $ = cheerio.load(
        new PrintAssembler({ cacheDir }).assemble(makeReferences(['std::list', 'std::vector']))
      );

      expect($('pre.de1').map((_, el) => $(el).html()).get()).toEqual(['int a;', 'return 0;']);
      expect($('p').html()).toBe('<span>kept</span>');
    });
  });

  describe('print', () => {
    it('should write the flattened document to cppreference_print.html', () => {
      cache('std::list', '<h1>std::list</h1>');
      const references = makeReferences(['std::list']);
      const assembler = new PrintAssembler({ cacheDir, outputDir });

      const outputPath = assembler.print(references);

      expect(outputPath).toBe(join(outputDir, 'cppreference_print.html'));
      expect(readFileSync(outputPath, 'utf-8')).toBe(assembler.assemble(references));
    });

    it('should write the colored document to cppreference_print_colored.html', () => {
      cache('std::list', '<h1>std::list</h1>');

      const outputPath = new PrintAssembler({ cacheDir, outputDir, colored: true }).print(
        makeReferences(['std::list'])
      );

      expect(outputPath).toBe(join(outputDir, 'cppreference_print_colored.html'));
      expect(existsSync(join(outputDir, 'cppreference_print.html'))).toBe(false);
    });

    it('should not write anything when pages are missing', () => {
      const assembler = new PrintAssembler({ cacheDir, outputDir });

      expect(() => assembler.print(makeReferences(['std::list']))).toThrow(MissingCachedPagesError);
      expect(existsSync(assembler.getOutputPath())).toBe(false);
    });
  });
});

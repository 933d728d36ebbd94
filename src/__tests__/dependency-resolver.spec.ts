import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_RESOLVE_OPTIONS, withDefaults } from '../config';
import { FORMAT_32 } from '../constants/chunk-tags';
import { detectSceneKind, getSceneDependencies, resolveAgainst, resolveDependencies } from '../dependency-resolver';
import { InputError } from '../types/errors';
import { logger } from '../utils/logger';
import { attributeData, createData, cstr, encodeScene, form } from './helpers/chunk-stream';

describe('dependency resolver', () => {
  let dir: string;

  function writeScene(name: string, content: string | Buffer): string {
    const filePath = join(dir, name);
    writeFileSync(filePath, content);
    return filePath;
  }

  function binaryScene(reference: string, texture: string): Buffer {
    return encodeScene([
      form('FREF', [{ tag: 'FREF', data: cstr(reference) }], FORMAT_32),
      form('RFIL', [
        { tag: 'CREA', data: createData('file1') },
        { tag: 'STR ', data: attributeData('ftn', cstr(texture)) },
      ], FORMAT_32),
    ], FORMAT_32);
  }

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'scene-deps-'));
    mkdirSync(join(dir, 'sub'));
    logger.setLevel('silent');
  });

  afterAll(() => {
    logger.setLevel('warn');
    rmSync(dir, { recursive: true, force: true });
  });

  describe('getSceneDependencies', () => {
    it('normalizes and deduplicates paths and drops the scene itself', () => {
      const scenePath = writeScene('a.ma', [
        `file -r -ns "b" "${dir}/b.ma";`,
        `file -r -ns "b2" "${dir}//b.ma";`,
        `setAttr ".ftn" -type "string" "${dir}\\textures\\wood.png";`,
        `setAttr ".ftn" -type "string" "${dir}/textures/wood.png";`,
        `file -r "${dir}/a.ma";`,
        'file -r "a.ma";',
      ].join('\n'));

      expect(getSceneDependencies(scenePath)).toEqual([`${dir}/b.ma`, `${dir}/textures/wood.png`]);
    });

    it('decodes binary scenes', () => {
      const scenePath = writeScene('set.mb', binaryScene(`${dir}/c.ma`, `${dir}/tex/stone.<UDIM>.exr`));

      expect(getSceneDependencies(scenePath)).toEqual([`${dir}/c.ma`, `${dir}/tex/stone.<UDIM>.exr`]);
    });

    it('trusts a binary signature over a text extension', () => {
      const scenePath = writeScene('disguised.ma', binaryScene('/assets/x.ma', '/tex/x.png'));

      expect(detectSceneKind(scenePath)).toBe('binary');
      expect(getSceneDependencies(scenePath)).toEqual(['/assets/x.ma', '/tex/x.png']);
    });

    it('streams text scenes above the threshold', () => {
      const scenePath = writeScene('streamed.ma', 'file -r "/assets/s.ma";\nsetAttr ".ftn" -type "string" "/tex/s.png";\n');

      expect(getSceneDependencies(scenePath, { streamThreshold: 0 })).toEqual(['/assets/s.ma', '/tex/s.png']);
    });

    it('rejects files without a scene extension or signature', () => {
      const filePath = writeScene('notes.txt', 'hello');

      expect(() => getSceneDependencies(filePath)).toThrow(InputError);
      expect(() => getSceneDependencies(filePath)).toThrow(
        `Unsupported scene file extension ".txt" (expected one of .ma, .mb): ${filePath}`
      );
    });
  });

  describe('resolveDependencies', () => {
    it('records failures without stopping the batch', () => {
      const bad = writeScene('bad.mb', 'JUNKJUNK');
      const good = writeScene('good.ma', 'file -r "/assets/good.ma";');
      const missing = join(dir, 'missing.ma');

      const result = resolveDependencies([bad, missing, good]);

      expect(result.errors).toEqual(new Map([
        [bad, 'Unrecognized magic signature "JUNK"'],
        [missing, `Scene file does not exist: ${missing}`],
      ]));
      expect(result.dependencies).toEqual(new Map([[good, ['/assets/good.ma']]]));
    });

    it('logs each scene as it starts resolving it', () => {
      const scenePath = writeScene('logged.ma', 'file -r "/assets/logged.ma";');
      const infoSpy = jest.spyOn(logger, 'info').mockImplementation(() => undefined);
      try {
        resolveDependencies([scenePath]);

        expect(infoSpy.mock.calls).toEqual([[`Resolving ${scenePath}`]]);
      } finally {
        infoSpy.mockRestore();
      }
    });

    it('resolves each input once', () => {
      const scenePath = writeScene('once.ma', 'file -r "/assets/once.ma";');

      const result = resolveDependencies([scenePath, `${dir}//once.ma`, ` ${scenePath} `]);

      expect(Array.from(result.dependencies.keys())).toEqual([scenePath]);
    });

    it('follows scene dependencies relative to the referencing file and stops at cycles', () => {
      const r1 = writeScene('r1.ma', 'file -r "r2.ma";\nfile -r "ghost.ma";');
      const r2 = writeScene('r2.ma', 'file -r "sub/r3.ma";');
      const r3 = writeScene('sub/r3.ma', 'file -r "../r1.ma";\nsetAttr ".ftn" -type "string" "tex.png";');
      const ghost = join(dir, 'ghost.ma');

      const result = resolveDependencies([r1], { recursive: true });

      expect(result.dependencies).toEqual(new Map([
        [r1, ['r2.ma', 'ghost.ma']],
        [r2, ['sub/r3.ma']],
        [r3, ['../r1.ma', 'tex.png']],
      ]));
      expect(result.errors).toEqual(new Map([[ghost, `Scene file does not exist: ${ghost}`]]));
    });

    it('does not follow dependencies unless recursive', () => {
      const flat = writeScene('flat.ma', 'file -r "r2.ma";');

      expect(Array.from(resolveDependencies([flat]).dependencies.keys())).toEqual([flat]);
    });

    it('expands environment variables in input paths when asked', () => {
      const scenePath = writeScene('env.ma', 'file -r "$SCENE_DEPS_ASSETS/env.ma";');
      process.env.SCENE_DEPS_TEST_DIR = dir;
      process.env.SCENE_DEPS_ASSETS = '/assets';
      try {
        const result = resolveDependencies(['$SCENE_DEPS_TEST_DIR/env.ma'], { expandEnvironment: true });

        expect(result.dependencies).toEqual(new Map([[scenePath, ['/assets/env.ma']]]));
      } finally {
        delete process.env.SCENE_DEPS_TEST_DIR;
        delete process.env.SCENE_DEPS_ASSETS;
      }
    });
  });

  it('resolves relative paths against the scene directory', () => {
    expect(resolveAgainst('/shots/s1/a.ma', '../lib/b.ma')).toBe('/shots/lib/b.ma');
    expect(resolveAgainst('/shots/s1/a.ma', '/abs/b.ma')).toBe('/abs/b.ma');
  });

  it('fills unset options from the defaults', () => {
    expect(withDefaults({ recursive: true })).toEqual({ ...DEFAULT_RESOLVE_OPTIONS, recursive: true });
    expect(withDefaults()).toEqual(DEFAULT_RESOLVE_OPTIONS);
  });
});

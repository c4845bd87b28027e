import assert from 'assert';
import fs from 'fs';
import { safeRm } from 'fs-remove-compat';
import path from 'path';
import { NotA7zArchiveError, unpack } from '../../src/index.ts';
import type { ExtractReport } from '../../src/types.ts';
import { DATA_DIR, FOLDER_TEXT, ROOT_TEXT, TARGET, TMP_DIR } from '../lib/constants.ts';

describe('unpack', () => {
  beforeEach((callback) => {
    safeRm(TMP_DIR, callback);
  });

  after((callback) => {
    safeRm(TMP_DIR, callback);
  });

  describe('callback', () => {
    it('should extract an archive', (done) => {
      unpack(path.join(DATA_DIR, 'solid.7z'), TARGET, (err?: Error | null, report?: ExtractReport) => {
        if (err) return done(err);
        assert.deepEqual(report ? report.extracted : [], [0, 1, 2]);
        assert.equal(fs.readFileSync(path.join(TARGET, 'test', 'test2.txt'), 'utf8'), FOLDER_TEXT);
        done();
      });
    });

    it('should pass options through', (done) => {
      unpack(path.join(DATA_DIR, 'ppmd.7z'), TARGET, { throwOnError: false }, (err?: Error | null, report?: ExtractReport) => {
        if (err) return done(err);
        assert.equal(report ? report.failures.length : 0, 2);
        done();
      });
    });

    it('should report open errors', (done) => {
      unpack(path.join(DATA_DIR, 'missing.7z'), TARGET, (err?: Error | null) => {
        assert.ok(err);
        assert.equal(err && 'code' in err ? err.code : undefined, 'ENOENT');
        done();
      });
    });
  });

  describe('promise', () => {
    it('should extract an archive', async () => {
      var report = await unpack(path.join(DATA_DIR, 'lzma2.7z'), TARGET);
      assert.deepEqual(report.failures, []);
      assert.equal(fs.readFileSync(path.join(TARGET, 'test1.txt'), 'utf8'), ROOT_TEXT);
    });

    it('should reject on a damaged archive', async () => {
      fs.mkdirSync(TMP_DIR, { recursive: true });
      var bogus = path.join(TMP_DIR, 'bogus.7z');
      fs.writeFileSync(bogus, 'this is not a 7z archive, only plain text');
      await assert.rejects(() => unpack(bogus, TARGET), NotA7zArchiveError);
    });

    it('should extract split archives from the first volume', async () => {
      var report = await unpack(path.join(DATA_DIR, 'mblock.7z.001'), TARGET);
      assert.deepEqual(report.extracted, [0, 1, 2, 3, 4]);
      assert.equal(fs.readFileSync(path.join(TARGET, 'readme.txt'), 'utf8'), 'multi-block archive\n');
    });
  });
});

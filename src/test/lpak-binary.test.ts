import * as assert from 'node:assert';
import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { BufferBundle } from '../bundle.js';
import { FormatError } from '../errors.js';
import type { FormatErrorCode } from '../errors.js';
import { LpakBinary } from '../lpak-binary.js';
import { buildBundle, buildManiacBundle } from './helpers/bundle-fixture.js';

function expectFormatError(code: FormatErrorCode, field: string): (error: unknown) => boolean {
  return (error: unknown): boolean => {
    assert.ok(error instanceof FormatError, `expected FormatError, got ${String(error)}`);
    assert.strictEqual(error.code, code);
    assert.strictEqual(error.field, field);
    return true;
  };
}

suite('LpakBinary.parse', () => {
  test('reads entries in directory order with absolute offsets', async () => {
    const table = await LpakBinary.parse(new BufferBundle(buildManiacBundle()));

    assert.deepStrictEqual(table.entries, [
      { index: 0, path: 'maniac/a.bin', offset: 64, size: 10, uncompressedSize: 10, compressed: false },
      { index: 1, path: 'maniac/b.bin', offset: 74, size: 0, uncompressedSize: 0, compressed: false }
    ]);
    assert.strictEqual(table.totalSize, 140);
    assert.deepStrictEqual(table.header, {
      byteOrder: 'little',
      version: 1,
      startOfFileEntries: 74,
      startOfFileNames: 114,
      startOfData: 64,
      sizeOfFileEntries: 40,
      entryCount: 2
    });
  });

  test('reads big-endian bundles to the same entries', async () => {
    const little = await LpakBinary.parse(new BufferBundle(buildManiacBundle('little')));
    const big = await LpakBinary.parse(new BufferBundle(buildManiacBundle('big')));

    assert.strictEqual(big.header.byteOrder, 'big');
    assert.deepStrictEqual(big.entries, little.entries);
  });

  test('normalizes backslash separators in names', async () => {
    const bundle = buildBundle([{ name: 'audio\\sfx\\door.ogg', data: Buffer.from('door') }]);

    const table = await LpakBinary.parse(new BufferBundle(bundle));

    assert.strictEqual(table.entries[0]?.path, 'audio/sfx/door.ogg');
  });

  test('reads names sequentially across records', async () => {
    const bundle = buildBundle([
      { name: 'first.txt', data: Buffer.from('1') },
      { name: 'second/deeper.txt', data: Buffer.from('22') },
      { name: 'third.txt', data: Buffer.from('333') }
    ]);

    const table = await LpakBinary.parse(new BufferBundle(bundle));

    assert.deepStrictEqual(table.entries.map((entry) => entry.path), ['first.txt', 'second/deeper.txt', 'third.txt']);
    assert.deepStrictEqual(table.entries.map((entry) => entry.offset), [40, 41, 43]);
  });

  test('uses the compressed size as the stored length of compressed entries', async () => {
    const bundle = buildBundle([{ name: 'packed.dat', data: Buffer.alloc(6, 7), compressed: true, uncompressedSize: 64 }]);

    const table = await LpakBinary.parse(new BufferBundle(bundle));

    assert.deepStrictEqual(table.entries[0], {
      index: 0,
      path: 'packed.dat',
      offset: 40,
      size: 6,
      uncompressedSize: 64,
      compressed: true
    });
  });

  test('accepts an empty directory', async () => {
    const table = await LpakBinary.parse(new BufferBundle(buildBundle([])));

    assert.strictEqual(table.header.entryCount, 0);
    assert.deepStrictEqual(table.entries, []);
  });

  test('returns a frozen table', async () => {
    const table = await LpakBinary.parse(new BufferBundle(buildManiacBundle()));

    assert.ok(Object.isFrozen(table));
    assert.ok(Object.isFrozen(table.entries));
    assert.ok(Object.isFrozen(table.entries[0]));
  });

  test('rejects an unknown signature', async () => {
    const bundle = buildManiacBundle();
    bundle.write('PACK', 0, 'latin1');

    await assert.rejects(LpakBinary.parse(new BufferBundle(bundle)), expectFormatError('BAD_SIGNATURE', 'signature'));
  });

  test('rejects a bundle too short to hold a signature', async () => {
    await assert.rejects(LpakBinary.parse(new BufferBundle(Buffer.from('KA', 'latin1'))), expectFormatError('BAD_SIGNATURE', 'signature'));
  });

  test('rejects the post-Full Throttle layout as an unsupported variant', async () => {
    const bundle = buildBundle([{ name: 'a.bin', data: Buffer.from('a') }], { version: 16320 });

    await assert.rejects(LpakBinary.parse(new BufferBundle(bundle)), expectFormatError('UNSUPPORTED_VARIANT', 'version'));
  });

  test('accepts the last pre-Full Throttle version', async () => {
    const bundle = buildBundle([{ name: 'a.bin', data: Buffer.from('a') }], { version: 16319, byteOrder: 'big' });

    const table = await LpakBinary.parse(new BufferBundle(bundle));

    assert.strictEqual(table.header.version, 16319);
  });

  test('rejects a header cut short', async () => {
    const bundle = Buffer.concat([Buffer.from('KAPL', 'latin1'), Buffer.alloc(10)]);

    await assert.rejects(LpakBinary.parse(new BufferBundle(bundle)), expectFormatError('TRUNCATED', 'header'));
  });

  test('rejects a directory that extends past the end of the bundle', async () => {
    const bundle = buildManiacBundle();
    bundle.writeUInt32LE(50 * 20, 28);

    await assert.rejects(LpakBinary.parse(new BufferBundle(bundle)), expectFormatError('TRUNCATED', 'directory'));
  });

  test('rejects an entry whose data extends past the end of the bundle', async () => {
    const bundle = buildBundle([
      { name: 'ok.bin', data: Buffer.from('ok') },
      { name: 'broken.bin', data: Buffer.from('x'), sizeField: 1000 }
    ]);

    await assert.rejects(LpakBinary.parse(new BufferBundle(bundle)), (error: unknown) => {
      assert.ok(error instanceof FormatError);
      assert.strictEqual(error.code, 'TRUNCATED');
      assert.strictEqual(error.field, 'entry');
      assert.match(error.message, /"broken\.bin"/);
      return true;
    });
  });

  test('adds startOfData when checking entry bounds', async () => {
    const bundle = buildBundle([{ name: 'shifted.bin', data: Buffer.from('abc'), dataOffsetField: 200 }], { dataStart: 48 });

    await assert.rejects(LpakBinary.parse(new BufferBundle(bundle)), expectFormatError('TRUNCATED', 'entry'));
  });

  test('rejects a name that runs past the end of the bundle', async () => {
    const bundle = buildManiacBundle().subarray(0, 139);

    await assert.rejects(LpakBinary.parse(new BufferBundle(bundle)), expectFormatError('TRUNCATED', 'name'));
  });

  test('rejects a name longer than 255 bytes', async () => {
    const bundle = buildBundle([
      { name: 'x'.repeat(300), data: Buffer.from('a') },
      { name: 'y.bin', data: Buffer.from('b') }
    ]);

    await assert.rejects(LpakBinary.parse(new BufferBundle(bundle)), (error: unknown) => {
      assert.ok(error instanceof FormatError);
      assert.strictEqual(error.field, 'name');
      assert.strictEqual(error.message, 'Name of record 0 is longer than 255 bytes');
      return true;
    });
  });
});

suite('LpakBinary.read', () => {
  let tempDir: string;

  setup(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lpak-read-'));
  });

  teardown(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test('parses a bundle file from disk', async () => {
    const filePath = path.join(tempDir, 'classic.lpak');
    await fs.writeFile(filePath, buildManiacBundle('big'));

    const table = await LpakBinary.read({ filePath });

    assert.deepStrictEqual(table.entries.map((entry) => entry.path), ['maniac/a.bin', 'maniac/b.bin']);
    assert.strictEqual(table.totalSize, 140);
  });

  test('fails when the file does not exist', async () => {
    await assert.rejects(LpakBinary.read({ filePath: path.join(tempDir, 'missing.lpak') }), /ENOENT/);
  });
});

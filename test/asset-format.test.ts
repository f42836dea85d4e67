import { describe, it } from 'node:test';
import assert from 'node:assert';
import { decodeAsset, detectAssetFormat } from '../src/asset-format.js';
import { InvalidMagicError } from '../src/errors.js';
import { buildRmanBody, buildRmanManifest } from './fixtures/rman-fixture.js';
import { buildWadV1 } from './fixtures/wad-fixture.js';

describe('asset format', () => {
  const body = buildRmanBody({ languages: [{ id: 7, name: 'ko_KR' }] });
  const manifest = buildRmanManifest(body, body.length);
  const wad = buildWadV1([{ hash: 1n, dataOffset: 36, compressedSize: 4, uncompressedSize: 4, compression: 0 }]);

  it('should detect formats from the leading tag', () => {
    assert.strictEqual(detectAssetFormat(manifest), 'rman');
    assert.strictEqual(detectAssetFormat(wad), 'wad');
    assert.strictEqual(detectAssetFormat(Buffer.from('PK\x03\x04')), 'unknown');
    assert.strictEqual(detectAssetFormat(Buffer.from('R')), 'unknown');
  });

  it('should dispatch to the RMAN decoder', () => {
    const decoded = decodeAsset({ buffer: manifest, decompress: (compressed) => compressed });

    assert.ok(decoded.format === 'rman');
    assert.deepStrictEqual(decoded.file.body.languages, [{ id: 7, name: 'ko_KR' }]);
  });

  it('should dispatch to the WAD decoder', () => {
    const decoded = decodeAsset({ buffer: wad });

    assert.ok(decoded.format === 'wad');
    assert.strictEqual(decoded.file.content.length, 1);
    assert.strictEqual(decoded.file.content[0].compressionType, 'NONE');
  });

  it('should honor a forced format', () => {
    assert.throws(() => decodeAsset({ buffer: wad, format: 'rman' }), InvalidMagicError);
  });

  it('should fail with InvalidMagic for unknown input', () => {
    assert.throws(
      () => decodeAsset({ buffer: Buffer.from('PK\x03\x04') }),
      (error: unknown) => error instanceof InvalidMagicError && error.expected === 'RMAN|RW' && error.found === 'PK\x03\x04'
    );
  });
});

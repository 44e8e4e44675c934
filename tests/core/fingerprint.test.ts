import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { canonicalizeLock, fingerprint } from '../../src/core/fingerprint.js';
import { parseCargoManifest } from '../../src/core/toolchains/cargo-manifest.js';
import { cargoLock, cargoToml, REGISTRY_SOURCE, type CargoProjectSpec } from '../test-helpers.js';

const BASE: CargoProjectSpec = {
  name: 'demo',
  dependencies: [
    { name: 'libA', version: '1.0.0' },
    { name: 'libB', version: '2.1.0', dependencies: ['libC'] }
  ],
  transitive: [{ name: 'libC', version: '0.3.4' }]
};

function fingerprintOf(spec: CargoProjectSpec, profile?: string): string {
  return fingerprint(parseCargoManifest(cargoToml(spec), cargoLock(spec)), { profile });
}

describe('fingerprint', () => {
  it('is a 64-character hex digest', () => {
    assert.match(fingerprintOf(BASE), /^[0-9a-f]{64}$/);
  });

  it('ignores declaration order and formatting', () => {
    const reordered: CargoProjectSpec = {
      ...BASE,
      dependencies: [...BASE.dependencies].reverse()
    };
    const spaced = {
      toml: cargoToml(BASE).replace(/ = /g, '    =   ') + '\n\n# trailing comment\n',
      lock: cargoLock(BASE).replace(/\n\n/g, '\n\n\n')
    };

    const expected = fingerprintOf(BASE);
    assert.equal(fingerprintOf(reordered), expected);
    assert.equal(fingerprint(parseCargoManifest(spaced.toml, spaced.lock)), expected);
  });

  it('changes when any resolved version changes', () => {
    const seen = new Set<string>([fingerprintOf(BASE)]);
    const variants: CargoProjectSpec[] = [
      { ...BASE, dependencies: [{ name: 'libA', version: '1.0.1' }, BASE.dependencies[1]] },
      { ...BASE, dependencies: [BASE.dependencies[0], { name: 'libB', version: '2.2.0', dependencies: ['libC'] }] },
      { ...BASE, transitive: [{ name: 'libC', version: '0.3.5' }] },
      { ...BASE, dependencies: [{ name: 'libA', version: '1.1.0' }, BASE.dependencies[1]] }
    ];

    for (const variant of variants) {
      seen.add(fingerprintOf(variant));
    }
    assert.equal(seen.size, variants.length + 1);
  });

  it('does not depend on application source or the root version', () => {
    assert.equal(fingerprintOf({ ...BASE, mainSource: 'fn main() { loop {} }\n' }), fingerprintOf(BASE));
    assert.equal(fingerprintOf({ ...BASE, version: '9.9.9' }), fingerprintOf(BASE));
  });

  it('depends on the build profile', () => {
    assert.notEqual(fingerprintOf(BASE, 'release'), fingerprintOf(BASE, 'dev'));
    assert.equal(fingerprintOf(BASE), fingerprintOf(BASE, 'release'));
  });

  it('depends on declared feature selections', () => {
    const manifest = parseCargoManifest(cargoToml(BASE), cargoLock(BASE));
    const withFeatures = parseCargoManifest(
      cargoToml(BASE).replace('libA = "1.0.0"', 'libA = { version = "1.0.0", features = ["serde", "std"] }'),
      cargoLock(BASE)
    );
    const featuresReordered = parseCargoManifest(
      cargoToml(BASE).replace('libA = "1.0.0"', 'libA = { version = "1.0.0", features = ["std", "serde"] }'),
      cargoLock(BASE)
    );

    assert.notEqual(fingerprint(withFeatures), fingerprint(manifest));
    assert.equal(fingerprint(featuresReordered), fingerprint(withFeatures));
  });

  it('depends on manifest sections that change how dependencies compile', () => {
    const base = fingerprintOf(BASE);
    const withSection = (section: string): string =>
      fingerprint(parseCargoManifest(cargoToml(BASE) + '\n' + section, cargoLock(BASE)));

    const optimized = withSection('[profile.release]\nopt-level = 3\nlto = true\n');
    const variants = [
      optimized,
      withSection('[profile.release]\nopt-level = "s"\nlto = true\n'),
      withSection('[features]\ndefault = ["libA/serde"]\n'),
      withSection('[patch.crates-io]\nlibA = { git = "https://example.com/libA.git" }\n'),
      withSection('[replace]\n"libB:2.1.0" = { git = "https://example.com/libB.git" }\n')
    ];

    assert.equal(new Set([base, ...variants]).size, variants.length + 1);
    assert.equal(withSection('[profile.release]\nlto = true\nopt-level = 3\n'), optimized);
  });

  it('ignores manifest sections that do not affect dependencies', () => {
    const withBadges = cargoToml(BASE) + '\n[badges]\nmaintenance = { status = "experimental" }\n';
    assert.equal(fingerprint(parseCargoManifest(withBadges, cargoLock(BASE))), fingerprintOf(BASE));
  });

  it('hashes a canonical text with sorted packages', () => {
    const manifest = parseCargoManifest(cargoToml(BASE), cargoLock(BASE));
    const canonical: unknown = JSON.parse(canonicalizeLock(manifest));

    assert.deepEqual(canonical, {
      schema: 2,
      toolchain: 'cargo',
      profile: 'release',
      packages: [
        { name: 'demo', version: null, source: null, checksum: null, dependencies: ['libA', 'libB'] },
        {
          name: 'libA',
          version: '1.0.0',
          source: REGISTRY_SOURCE,
          checksum: manifest.locked[1].checksum,
          dependencies: []
        },
        {
          name: 'libB',
          version: '2.1.0',
          source: REGISTRY_SOURCE,
          checksum: manifest.locked[2].checksum,
          dependencies: ['libC']
        },
        {
          name: 'libC',
          version: '0.3.4',
          source: REGISTRY_SOURCE,
          checksum: manifest.locked[3].checksum,
          dependencies: []
        }
      ],
      features: [],
      settings: {}
    });
  });
});

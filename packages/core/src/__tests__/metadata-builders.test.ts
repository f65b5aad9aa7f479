/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { describe, it, expect } from 'vitest';
import { buildDistInfo, splitPackageName } from '../metadata/dist';
import { buildPackageInfo, computeUid, pickPassThroughFields } from '../metadata/package-info';
import {
  buildPackagesDocument,
  packageNamesFromComponents,
  packageNamesFromList,
} from '../metadata/packages-document';
import { buildZipballPath } from '../metadata/paths';
import { formatComposerTime } from '../metadata/time';
import { parseDocument, serializeDocument } from '../json/codec';
import { toPlain } from '../json/value';
import { MalformedNameError, TypeMismatchError } from '../errors';

const repository = { name: 'composer-hosted', url: 'https://repo.example.com/repository/composer-hosted' };

describe('Metadata Builders', () => {
  describe('buildZipballPath', () => {
    it('should nest the archive under vendor, project and version', () => {
      expect(buildZipballPath('acme', 'widget', '1.2.0')).toBe('acme/widget/1.2.0/acme-widget-1.2.0.zip');
    });
  });

  describe('formatComposerTime', () => {
    it('should render UTC with an explicit offset and no milliseconds', () => {
      expect(formatComposerTime(new Date('2024-03-05T10:20:30.999Z'))).toBe('2024-03-05T10:20:30+00:00');
    });

    it('should convert other offsets to UTC', () => {
      expect(formatComposerTime(new Date('2024-01-01T01:30:00+02:00'))).toBe('2023-12-31T23:30:00+00:00');
    });

    it('should reject an invalid date', () => {
      expect(() => formatComposerTime(new Date('not a date'))).toThrow(RangeError);
    });
  });

  describe('splitPackageName', () => {
    it('should split vendor and project', () => {
      expect(splitPackageName('acme/widget')).toEqual({ vendor: 'acme', project: 'widget' });
    });

    it.each(['widget', 'acme/widget/extra', '/widget', 'acme/', ''])('should reject "%s"', (name) => {
      expect(() => splitPackageName(name)).toThrow(MalformedNameError);
    });
  });

  describe('buildDistInfo', () => {
    it('should point the url at the repository zipball path', () => {
      const dist = buildDistInfo(repository, {
        packageName: 'acme/widget',
        version: '1.2.0',
        reference: 'abc123',
        shasum: 'def456',
        type: 'zip',
      });

      expect(serializeDocument(dist)).toBe(
        '{"url":"https://repo.example.com/repository/composer-hosted/acme/widget/1.2.0/acme-widget-1.2.0.zip",' +
          '"type":"zip","reference":"abc123","shasum":"def456"}'
      );
    });

    it('should keep null reference and shasum', () => {
      const dist = buildDistInfo(repository, {
        packageName: 'acme/widget',
        version: '1.2.0',
        reference: null,
        shasum: null,
        type: 'zip',
      });
      expect(dist.get('reference')).toBeNull();
      expect(dist.get('shasum')).toBeNull();
    });

    it('should use a custom path builder', () => {
      const dist = buildDistInfo(
        repository,
        { packageName: 'acme/widget', version: '1.2.0', reference: null, shasum: null, type: 'zip' },
        (vendor, project, version) => `dists/${vendor}~${project}~${version}.zip`
      );
      expect(dist.get('url')).toBe('https://repo.example.com/repository/composer-hosted/dists/acme~widget~1.2.0.zip');
    });

    it('should fail on a malformed package name', () => {
      expect(() =>
        buildDistInfo(repository, { packageName: 'widget', version: '1.0.0', reference: null, shasum: null, type: 'zip' })
      ).toThrow('Malformed package name "widget", expected "vendor/project"');
    });
  });

  describe('computeUid', () => {
    it('should match the md5-derived identifier', () => {
      expect(computeUid('acme/widget', '1.2.0', '2024-03-05T10:20:30+00:00')).toBe(3799860487);
      expect(computeUid('vendor/package', '1.0.0', '2024-01-01T00:00:00+00:00')).toBe(3187469669);
    });

    it('should be stable across calls', () => {
      const first = computeUid('vendor/package', '1.0.0', '2024-01-01T00:00:00+00:00');
      const second = computeUid('vendor/package', '1.0.0', '2024-01-01T00:00:00+00:00');
      expect(first).toBe(second);
    });

    it('should change when any input changes', () => {
      const base = computeUid('vendor/package', '1.0.0', '2024-01-01T00:00:00+00:00');
      expect(computeUid('vendor/package', '1.0.1', '2024-01-01T00:00:00+00:00')).toBe(1278569819);
      expect(computeUid('vendor/other', '1.0.0', '2024-01-01T00:00:00+00:00')).not.toBe(base);
      expect(computeUid('vendor/package', '1.0.0', '2024-01-02T00:00:00+00:00')).not.toBe(base);
    });

    it('should always be an unsigned 32-bit integer', () => {
      const uid = computeUid('acme/widget', '1.2.0', '2024-03-05T10:20:30+00:00');
      expect(Number.isInteger(uid)).toBe(true);
      expect(uid).toBeGreaterThanOrEqual(0);
      expect(uid).toBeLessThan(2 ** 32);
    });
  });

  describe('buildPackageInfo', () => {
    it('should build name, version, dist, time and uid in order', () => {
      const info = buildPackageInfo(repository, {
        packageName: 'acme/widget',
        version: '1.2.0',
        reference: 'abc123',
        shasum: 'abc123',
        type: 'zip',
        time: '2024-03-05T10:20:30+00:00',
      });

      expect([...info.keys()]).toEqual(['name', 'version', 'dist', 'time', 'uid']);
      expect(info.get('uid')).toBe(3799860487);
    });

    it('should copy known manifest fields and drop unknown ones', () => {
      const source = parseDocument(
        JSON.stringify({
          name: 'upstream/renamed',
          version: '9.9.9',
          description: 'A widget',
          require: { php: '>=8.1' },
          homepage: 'https://widget.example.com',
          'require-dev': { 'phpunit/phpunit': '^10.0' },
          uid: 1,
          source: { type: 'git', url: 'https://git.example.com/widget.git' },
          license: ['MIT'],
        })
      );

      const info = buildPackageInfo(repository, {
        packageName: 'acme/widget',
        version: '1.2.0',
        reference: null,
        shasum: null,
        type: 'zip',
        time: '2024-03-05T10:20:30+00:00',
        source,
      });

      expect([...info.keys()]).toEqual([
        'name',
        'version',
        'dist',
        'time',
        'uid',
        'description',
        'license',
        'require',
        'require-dev',
      ]);
      expect(info.get('name')).toBe('acme/widget');
      expect(info.get('version')).toBe('1.2.0');
      expect(info.get('uid')).toBe(3799860487);
      expect(toPlain(info)).toMatchObject({ require: { php: '>=8.1' }, license: ['MIT'] });
    });

    it('should leave the target untouched without a source', () => {
      const target = parseDocument('{"name":"acme/widget"}');
      expect(pickPassThroughFields(undefined, target)).toBe(target);
      expect(serializeDocument(target)).toBe('{"name":"acme/widget"}');
    });
  });

  describe('buildPackagesDocument', () => {
    it('should emit the providers-url template and null hashes', () => {
      const doc = buildPackagesDocument(repository, ['acme/widget', 'acme/gadget']);
      expect(serializeDocument(doc)).toBe(
        '{"providers-url":"https://repo.example.com/repository/composer-hosted/p/%package%.json",' +
          '"providers":{"acme/widget":{"sha256":null},"acme/gadget":{"sha256":null}}}'
      );
    });

    it('should deduplicate names keeping first-seen order', () => {
      const doc = buildPackagesDocument(repository, ['b/b', 'a/a', 'b/b', 'c/c', 'a/a']);
      expect(serializeDocument(doc)).toBe(
        '{"providers-url":"https://repo.example.com/repository/composer-hosted/p/%package%.json",' +
          '"providers":{"b/b":{"sha256":null},"a/a":{"sha256":null},"c/c":{"sha256":null}}}'
      );
    });

    it('should read names from list.json', () => {
      const list = parseDocument('{"packageNames":["acme/widget","acme/gadget"]}');
      expect(packageNamesFromList(list)).toEqual(['acme/widget', 'acme/gadget']);
    });

    it('should reject a list.json without packageNames', () => {
      expect(() => packageNamesFromList(parseDocument('{}'))).toThrow(TypeMismatchError);
      expect(() => packageNamesFromList(parseDocument('{"packageNames":["a/b",3]}'))).toThrow(
        'Expected string at "packageNames.1", found number'
      );
    });

    it('should derive names from catalog components', () => {
      expect(packageNamesFromComponents([
        { group: 'acme', name: 'widget' },
        { group: 'acme', name: 'gadget' },
      ])).toEqual(['acme/widget', 'acme/gadget']);
    });
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, statSync, utimesSync } from 'fs';
import { join } from 'path';
import { Redater, type RedateEvent } from './redater';
import { DateWriter } from '../export/writer';
import { InvalidArgumentError, InvalidDateError, IOError, NotFoundError } from '../errors';
import { CopyEncoder, MemoryTagStore, makeTempDir, writeFile } from '../../tests/fakes';

describe('Redater', () => {
  let root: string;
  let store: MemoryTagStore;
  let encoder: CopyEncoder;
  let events: RedateEvent[];
  let redater: Redater;

  beforeEach(() => {
    root = makeTempDir();
    store = new MemoryTagStore();
    encoder = new CopyEncoder();
    events = [];
    const writer = new DateWriter(store, encoder, { jpegQuality: 95, reencode: 'copy' });
    redater = new Redater(store, writer, { onEvent: (event) => events.push(event) });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function photo(relativePath: string, dateTime?: string): string {
    const path = writeFile(root, relativePath, `bytes of ${relativePath}`);
    if (dateTime) store.tags.set(path, { DateTime: dateTime });
    return path;
  }

  describe('processFile()', () => {
    it('should set year and month in tags and file time', async () => {
      const a = photo('a.jpg', '2019:05:17 10:00:00');

      const outcome = await redater.processFile(a, { year: 2023, month: 12 });

      expect(outcome.status).toBe('succeeded');
      expect(outcome.metadataWritten).toBe(true);
      expect(store.tags.get(a)).toEqual({
        DateTime: '2023:12:17 10:00:00',
        DateTimeOriginal: '2023:12:17 10:00:00',
        DateTimeDigitized: '2023:12:17 10:00:00',
      });
      expect(statSync(a).mtime.getTime()).toBe(new Date(2023, 11, 17, 10, 0, 0).getTime());
    });

    it('should use the file time when the image has no date tag', async () => {
      const a = photo('a.jpg');
      utimesSync(a, new Date(2015, 2, 8, 9, 15, 0), new Date(2015, 2, 8, 9, 15, 0));

      const outcome = await redater.processFile(a, { year: 2020 });

      expect(outcome.source).toEqual({ kind: 'file-mtime', reason: 'no-date-tag' });
      expect(outcome.updated).toEqual({ year: 2020, month: 3, day: 8, hour: 9, minute: 15, second: 0 });
      expect(store.writes).toEqual([{ filePath: a, exifText: '2020:03:08 09:15:00' }]);
    });

    it('should write into an existing output folder', async () => {
      const a = photo('a.jpg', '2019:05:17 10:00:00');
      const out = join(root, 'out');
      mkdirSync(out);

      const outcome = await redater.processFile(a, { year: 2023 }, { output: out });

      expect(outcome.outputPath).toBe(join(out, 'a.jpg'));
      expect(store.tags.get(join(out, 'a.jpg'))?.DateTime).toBe('2023:05:17 10:00:00');
      expect(store.tags.get(a)?.DateTime).toBe('2019:05:17 10:00:00');
    });

    it('should throw for a missing file', async () => {
      await expect(redater.processFile(join(root, 'nope.jpg'), { year: 2020 })).rejects.toThrow(NotFoundError);
    });

    it('should throw for a file that is not a JPEG', async () => {
      const txt = writeFile(root, 'notes.txt');
      await expect(redater.processFile(txt, { year: 2020 })).rejects.toThrow(InvalidArgumentError);
    });

    it('should validate the substitution before touching the file', async () => {
      const a = photo('a.jpg', '2019:05:17 10:00:00');
      await expect(redater.processFile(a, { year: 1850 })).rejects.toThrow(InvalidArgumentError);
      expect(store.writes).toEqual([]);
    });

    it('should surface a calendar overflow', async () => {
      const a = photo('a.jpg', '2020:01:29 12:00:00');
      await expect(redater.processFile(a, { year: 2023, month: 2 })).rejects.toThrow(InvalidDateError);
      expect(store.writes).toEqual([]);
    });
  });

  describe('processFolder()', () => {
    it('should change only the year of every JPEG in the folder', async () => {
      const a = photo('a.jpg', '2015:03:08 09:15:00');
      const b = photo('b.jpg', '2016:11:30 18:45:10');
      const c = photo('c.jpeg', '2017:07:04 23:59:59');
      writeFile(root, 'readme.txt');

      const result = await redater.processFolder(root, { year: 2020 });

      expect(result.succeeded).toBe(3);
      expect(result.failed).toBe(0);
      expect(result.total).toBe(3);
      expect(store.tags.get(a)?.DateTime).toBe('2020:03:08 09:15:00');
      expect(store.tags.get(b)?.DateTime).toBe('2020:11:30 18:45:10');
      expect(store.tags.get(c)?.DateTime).toBe('2020:07:04 23:59:59');
    });

    it('should count a calendar overflow as failed and continue', async () => {
      photo('a.jpg', '2020:02:29 12:00:00');
      const b = photo('b.jpg', '2019:05:17 10:00:00');

      const result = await redater.processFolder(root, { year: 2023, month: 2 });

      expect(result).toMatchObject({ succeeded: 1, failed: 1, total: 2 });
      expect(result.outcomes[0].status).toBe('failed');
      expect(result.outcomes[0].error).toBeInstanceOf(InvalidDateError);
      expect(result.outcomes[0].original).toEqual({ year: 2020, month: 2, day: 29, hour: 12, minute: 0, second: 0 });
      expect(result.outcomes[1].status).toBe('succeeded');
      expect(store.tags.get(b)?.DateTime).toBe('2023:02:17 10:00:00');
    });

    it('should isolate read failures', async () => {
      const a = photo('a.jpg', '2019:05:17 10:00:00');
      const b = photo('b.jpg', '2019:05:18 10:00:00');
      store.failReads.add(a);

      const result = await redater.processFolder(root, { year: 2021 });

      expect(result).toMatchObject({ succeeded: 1, failed: 1, total: 2 });
      expect(result.outcomes[0].error).toBeInstanceOf(IOError);
      expect(store.tags.get(b)?.DateTime).toBe('2021:05:18 10:00:00');
    });

    it('should not modify anything in dry-run mode', async () => {
      const a = photo('a.jpg', '2019:05:17 10:00:00');
      const b = photo('b.jpg', '2020:02:29 08:00:00');
      const before = new Date(2010, 0, 1, 12, 0, 0);
      utimesSync(a, before, before);
      utimesSync(b, before, before);

      const result = await redater.processFolder(root, { year: 2023, month: 2 }, { dryRun: true });

      expect(result).toMatchObject({ succeeded: 1, failed: 1, total: 2 });
      expect(result.outcomes[0].status).toBe('planned');
      expect(result.outcomes[0].updated).toEqual({ year: 2023, month: 2, day: 17, hour: 10, minute: 0, second: 0 });
      expect(store.writes).toEqual([]);
      expect(encoder.calls).toEqual([]);
      expect(readFileSync(a, 'utf-8')).toBe('bytes of a.jpg');
      expect(statSync(a).mtime.getTime()).toBe(before.getTime());
      expect(statSync(b).mtime.getTime()).toBe(before.getTime());
    });

    it('should mirror the folder tree under the output folder', async () => {
      const a = photo('a.jpg', '2019:05:17 10:00:00');
      const d = photo('sub/deeper/d.jpg', '2018:01:02 03:04:05');
      const out = makeTempDir();

      try {
        const result = await redater.processFolder(root, { year: 2000 }, { output: out, recursive: true });

        expect(result.succeeded).toBe(2);
        expect(existsSync(join(out, 'a.jpg'))).toBe(true);
        expect(existsSync(join(out, 'sub', 'deeper', 'd.jpg'))).toBe(true);
        expect(store.tags.get(join(out, 'sub', 'deeper', 'd.jpg'))?.DateTime).toBe('2000:01:02 03:04:05');
        expect(store.tags.get(a)?.DateTime).toBe('2019:05:17 10:00:00');
        expect(store.tags.get(d)?.DateTime).toBe('2018:01:02 03:04:05');
        expect(encoder.calls.map((c) => c.destinationPath)).toEqual([
          join(out, 'a.jpg'),
          join(out, 'sub', 'deeper', 'd.jpg'),
        ]);
      } finally {
        rmSync(out, { recursive: true, force: true });
      }
    });

    it('should emit progress events in order', async () => {
      const a = photo('a.jpg', '2019:05:17 10:00:00');
      const b = photo('b.jpg', '2019:05:18 10:00:00');

      await redater.processFolder(root, { year: 2022 });

      expect(events.map((e) => e.type)).toEqual([
        'discovered',
        'file-start',
        'file-done',
        'file-start',
        'file-done',
      ]);
      expect(events[0]).toEqual({ type: 'discovered', folder: root, count: 2, recursive: false });
      expect(events[1]).toEqual({ type: 'file-start', path: a, index: 1, total: 2 });
      expect(events[3]).toEqual({ type: 'file-start', path: b, index: 2, total: 2 });
    });

    it('should return a frozen result', async () => {
      photo('a.jpg', '2019:05:17 10:00:00');
      const result = await redater.processFolder(root, { year: 2022 });
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.outcomes)).toBe(true);
      expect(Object.isFrozen(result.outcomes[0])).toBe(true);
      expect(Object.isFrozen(result.outcomes[0].warnings)).toBe(true);
    });

    it('should return an empty result when no JPEG exists', async () => {
      writeFile(root, 'readme.txt');
      const result = await redater.processFolder(root, { year: 2022 });
      expect(result).toEqual({ succeeded: 0, failed: 0, total: 0, outcomes: [] });
    });

    it('should fail before processing when the folder is missing', async () => {
      await expect(redater.processFolder(join(root, 'missing'), { year: 2022 })).rejects.toThrow(NotFoundError);
      expect(events).toEqual([]);
    });
  });

  describe('inspect()', () => {
    it('should report dates and their sources without writing', async () => {
      const a = photo('a.jpg', '2019:05:17 10:00:00');
      const b = photo('b.jpg');
      utimesSync(b, new Date(2011, 10, 12, 13, 14, 15), new Date(2011, 10, 12, 13, 14, 15));
      const c = photo('c.jpg', '2019:05:17 10:00:00');
      store.failReads.add(c);

      const images = await redater.inspect(root);

      expect(images).toHaveLength(3);
      expect(images[0]).toEqual({
        path: a,
        captureDate: { year: 2019, month: 5, day: 17, hour: 10, minute: 0, second: 0 },
        source: { kind: 'exif', tag: 'DateTime' },
      });
      expect(images[1].source).toEqual({ kind: 'file-mtime', reason: 'no-date-tag' });
      expect(images[1].captureDate).toEqual({ year: 2011, month: 11, day: 12, hour: 13, minute: 14, second: 15 });
      expect(images[2].error).toBeInstanceOf(IOError);
      expect(store.writes).toEqual([]);
    });

    it('should inspect a single file', async () => {
      const a = photo('a.jpg', '2019:05:17 10:00:00');
      const images = await redater.inspect(a);
      expect(images.map((i) => i.path)).toEqual([a]);
    });
  });
});

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AnnotationFormatError, MissingAnnotationError, MissingReferenceError } from '../utils/errors';
import { hasAnnotatedBeats, loadAnnotation, readReferences, referencePathFor, sectionLevelFor } from './annotations';

let root: string;

async function writeReference(name: string, content: unknown) {
  await fs.writeFile(path.join(root, 'references', `${name}.jams`), JSON.stringify(content));
}

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'annotations-'));
  await fs.mkdir(path.join(root, 'references'));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('loadAnnotation', () => {
  it('loads beats and sections', async () => {
    await writeReference('Isophonics_1', {
      beats: [{ data: [{ time: 0.4, confidence: 1 }] }],
      sections: [{ level: 'function', data: [{ start: 0, end: 5, label: 'intro' }] }],
    });

    const document = await loadAnnotation(path.join(root, 'references', 'Isophonics_1.jams'));

    expect(document.beats?.[0].data[0].time).toBe(0.4);
    expect(document.sections?.[0].data[0].label).toBe('intro');
  });

  it('reports a missing file', async () => {
    await expect(loadAnnotation(path.join(root, 'references', 'nope.jams'))).rejects.toThrow(MissingAnnotationError);
  });

  it('rejects malformed JSON', async () => {
    await fs.writeFile(path.join(root, 'references', 'bad.jams'), '{"beats": [');

    await expect(loadAnnotation(path.join(root, 'references', 'bad.jams'))).rejects.toThrow(AnnotationFormatError);
  });

  it('rejects beats without times', async () => {
    await writeReference('bad', { beats: [{ data: [{ confidence: 1 }] }] });

    await expect(loadAnnotation(path.join(root, 'references', 'bad.jams'))).rejects.toThrow(AnnotationFormatError);
  });
});

describe('hasAnnotatedBeats', () => {
  it('requires a non-empty first beat annotation', () => {
    expect(hasAnnotatedBeats({ beats: [{ data: [{ time: 1 }] }] })).toBe(true);
    expect(hasAnnotatedBeats({ beats: [{ data: [] }, { data: [{ time: 1 }] }] })).toBe(false);
    expect(hasAnnotatedBeats({ beats: [] })).toBe(false);
    expect(hasAnnotatedBeats({})).toBe(false);
  });
});

describe('readReferences', () => {
  it('converts the sections of the dataset level to boundaries and labels', async () => {
    await writeReference('SALAMI_7', {
      sections: [
        { level: 'function', data: [{ start: 0, end: 30, label: 'verse' }] },
        {
          level: 'large_scale',
          data: [
            { start: 12.5, end: 30, label: 'B' },
            { start: 0, end: 12.5, label: 'A' },
          ],
        },
      ],
    });

    const references = await readReferences(path.join(root, 'audio', 'SALAMI_7.mp3'));

    expect(references).toEqual({ boundaries: [0, 12.5, 30], labels: ['A', 'B'] });
  });

  it('falls back to the first section annotation', async () => {
    await writeReference('Epiphyte_3', {
      sections: [{ level: 'small_scale', data: [{ start: 0, end: 4, label: 'a' }] }],
    });

    const references = await readReferences(path.join(root, 'audio', 'Epiphyte_3.wav'));

    expect(references).toEqual({ boundaries: [0, 4], labels: ['a'] });
  });

  it('reports a missing reference file', async () => {
    await expect(readReferences(path.join(root, 'audio', 'SALAMI_9.mp3'))).rejects.toThrow(MissingReferenceError);
  });

  it('reports a reference without sections', async () => {
    await writeReference('SALAMI_8', { beats: [] });

    await expect(readReferences(path.join(root, 'audio', 'SALAMI_8.mp3'))).rejects.toThrow(MissingReferenceError);
  });
});

describe('reference paths', () => {
  it('maps an audio file to its reference file', () => {
    expect(referencePathFor(path.join('/data', 'audio', 'SALAMI_7.mp3'))).toBe(
      path.join('/data', 'references', 'SALAMI_7.jams'),
    );
  });

  it('picks the section level from the dataset prefix', () => {
    expect(sectionLevelFor('/data/audio/SALAMI_7.mp3')).toBe('large_scale');
    expect(sectionLevelFor('/data/audio/Isophonics_7.mp3')).toBe('function');
    expect(sectionLevelFor('/data/audio/Other_7.mp3')).toBe('function');
  });
});

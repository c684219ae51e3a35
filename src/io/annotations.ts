import { Type } from 'class-transformer';
import {
  IsArray,
  IsNumber,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import path from 'node:path';
import { SegmentEstimate, SegmentInterval } from '../algorithms/ISegmentAlgorithm';
import {
  AnnotationFormatError,
  MissingAnnotationError,
  MissingReferenceError,
  getErrorMessage,
} from '../utils/errors';
import { readJsonFile } from '../utils/file';
import { intervalsToTimes } from '../utils/intervals';
import { validatePlain } from '../utils/validation';
import { DATASET_LAYOUT } from './dataset';

export class BeatObservation {
  @IsNumber()
  @Min(0)
  time!: number;

  @IsOptional()
  @IsNumber()
  confidence?: number;
}

export class BeatAnnotation {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BeatObservation)
  data!: BeatObservation[];
}

export class SectionObservation {
  @IsNumber()
  @Min(0)
  start!: number;

  @IsNumber()
  @Min(0)
  end!: number;

  @IsString()
  label!: string;
}

export class SectionAnnotation {
  @IsString()
  level!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SectionObservation)
  data!: SectionObservation[];
}

export class AnnotationDocument {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BeatAnnotation)
  beats?: BeatAnnotation[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SectionAnnotation)
  sections?: SectionAnnotation[];
}

export interface ReferenceReader {
  readReferences(audioPath: string): Promise<SegmentEstimate>;
}

export const DEFAULT_SECTION_LEVEL = 'function';

/** Section level used as reference for each dataset prefix. */
export const SECTION_LEVELS: Readonly<Record<string, string>> = {
  Cerulean: 'large_scale',
  Epiphyte: 'function',
  Isophonics: 'function',
  SALAMI: 'large_scale',
};

export async function loadAnnotation(annotationPath: string): Promise<AnnotationDocument> {
  let plain: unknown;
  try {
    plain = await readJsonFile(annotationPath);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new AnnotationFormatError(annotationPath, getErrorMessage(error));
    }
    throw error;
  }
  if (plain === undefined) {
    throw new MissingAnnotationError(annotationPath);
  }
  const { value, errors } = await validatePlain(AnnotationDocument, plain);
  if (!value) {
    throw new AnnotationFormatError(annotationPath, errors.join('; '));
  }
  return value;
}

/** True when the document has a first beat annotation with at least one beat. */
export function hasAnnotatedBeats(document: AnnotationDocument): boolean {
  const first = document.beats?.[0];
  return first !== undefined && first.data.length > 0;
}

export function referencePathFor(audioPath: string): string {
  const datasetPath = path.dirname(path.dirname(audioPath));
  const base = path.basename(audioPath, path.extname(audioPath));
  return path.join(datasetPath, DATASET_LAYOUT.referencesDir, base + DATASET_LAYOUT.referencesExt);
}

export function sectionLevelFor(audioPath: string): string {
  const prefix = path.basename(audioPath).split('_')[0];
  return SECTION_LEVELS[prefix] ?? DEFAULT_SECTION_LEVEL;
}

export function selectSections(document: AnnotationDocument, level: string): SectionAnnotation | undefined {
  const sections = document.sections ?? [];
  return sections.find((section) => section.level === level) ?? sections[0];
}

/** Reads reference boundaries and labels from the `references/` file matching an audio file. */
export async function readReferences(audioPath: string): Promise<SegmentEstimate> {
  const referencePath = referencePathFor(audioPath);
  let document: AnnotationDocument;
  try {
    document = await loadAnnotation(referencePath);
  } catch (error) {
    if (error instanceof MissingAnnotationError) {
      throw new MissingReferenceError(referencePath);
    }
    throw error;
  }

  const sections = selectSections(document, sectionLevelFor(audioPath));
  if (!sections || !sections.data.length) {
    throw new MissingReferenceError(referencePath);
  }

  const observations = [...sections.data].sort((a, b) => a.start - b.start);
  const intervals = observations.map((obs): SegmentInterval => [obs.start, obs.end]);
  return {
    boundaries: intervalsToTimes(intervals),
    labels: observations.map((obs) => obs.label),
  };
}

export const referenceReader: ReferenceReader = { readReferences };

import { IsArray, IsNumber, IsString } from 'class-validator';
import { Dispatcher, fetch } from 'undici';
import { AnalyzerRequestError } from '../utils/errors';
import { validatePlain } from '../utils/validation';
import {
  AlgorithmContext,
  AlgorithmDefinition,
  AlgorithmInput,
  ConfigValue,
  Configuration,
  SegmentAlgorithm,
  SegmentEstimate,
} from './ISegmentAlgorithm';

export interface SegmentRequest {
  algorithm: string;
  audioPath: string;
  input: AlgorithmInput;
  config: Configuration;
  seed: number;
}

export class SegmentResponse {
  @IsArray()
  @IsNumber({}, { each: true })
  boundaries!: number[];

  @IsArray()
  @IsString({ each: true })
  labels!: string[];
}

export interface HttpAlgorithmOptions {
  name: string;
  endpoint: string;
  timeoutMs: number;
  boundaries: boolean;
  labels: boolean;
  defaults?: Record<string, ConfigValue>;
  dispatcher?: Dispatcher;
}

/** Runs an algorithm hosted by an analysis service over HTTP. */
export class HttpAlgorithm implements SegmentAlgorithm {
  constructor(
    private readonly endpoint: string,
    private readonly timeoutMs: number,
    private readonly request: SegmentRequest,
    private readonly dispatcher?: Dispatcher,
  ) {}

  async process(): Promise<SegmentEstimate> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(`${this.endpoint}/segment`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(this.request),
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      if (!response.ok) {
        throw new AnalyzerRequestError(
          `Analyzer ${this.request.algorithm} error ${response.status}`,
          response.status,
        );
      }

      const { value, errors } = await validatePlain(SegmentResponse, await response.json());
      if (!value) {
        throw new AnalyzerRequestError(
          `Analyzer ${this.request.algorithm} returned an invalid response: ${errors.join('; ')}`,
        );
      }
      return { boundaries: value.boundaries, labels: value.labels };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new AnalyzerRequestError(
          `Analyzer ${this.request.algorithm} timed out after ${this.timeoutMs} ms`,
        );
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function createHttpDefinition(options: HttpAlgorithmOptions): AlgorithmDefinition {
  const endpoint = options.endpoint.replace(/\/+$/, '');
  return {
    name: options.name,
    supportsBoundaryDetection: options.boundaries,
    supportsLabeling: options.labels,
    defaults: options.defaults ?? {},
    create(audioPath: string, input: AlgorithmInput, { config, seed }: AlgorithmContext) {
      return new HttpAlgorithm(
        endpoint,
        options.timeoutMs,
        { algorithm: options.name, audioPath, input, config, seed },
        options.dispatcher,
      );
    },
  };
}

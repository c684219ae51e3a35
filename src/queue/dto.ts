import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Min } from 'class-validator';
import { FEATURE_TYPES, FeatureType } from '../algorithms/ISegmentAlgorithm';

export class SegmentDatasetJobDto {
  @IsString()
  datasetPath!: string;

  @IsOptional()
  @IsIn(FEATURE_TYPES)
  feature?: FeatureType;

  @IsOptional()
  @IsBoolean()
  annotBeats?: boolean;

  @IsOptional()
  @IsBoolean()
  framesync?: boolean;

  @IsOptional()
  @IsString()
  boundariesId?: string;

  @IsOptional()
  @IsString()
  labelsId?: string;

  @IsOptional()
  @IsString()
  dsName?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  nJobs?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  seed?: number;
}

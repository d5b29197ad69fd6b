import { Type } from 'class-transformer';
import { IsArray, IsOptional, IsString, ValidateNested } from 'class-validator';

export class OmdbRatingDto {
  @IsOptional()
  @IsString()
  Source?: string;

  @IsOptional()
  @IsString()
  Value?: string;
}

export class OmdbMovieDto {
  @IsString()
  imdbID!: string;

  @IsString()
  Title!: string;

  @IsOptional()
  @IsString()
  Year?: string;

  @IsOptional()
  @IsString()
  imdbRating?: string;

  @IsOptional()
  @IsString()
  imdbVotes?: string;

  @IsOptional()
  @IsString()
  Metascore?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => OmdbRatingDto)
  Ratings?: OmdbRatingDto[];
}

/** Envelope check only; OMDb answers misses with HTTP 200 and `Response: "False"`. */
export class OmdbEnvelopeDto {
  @IsOptional()
  @IsString()
  Response?: string;

  @IsOptional()
  @IsString()
  Error?: string;

  @IsOptional()
  @IsArray()
  Search?: unknown[];
}

import { IsArray, IsInt, IsNumber, IsOptional, IsString } from 'class-validator';

export class TmdbMovieDto {
  @IsInt()
  id!: number;

  @IsString()
  title!: string;

  @IsOptional()
  @IsString()
  original_title?: string | null;

  @IsOptional()
  @IsString()
  release_date?: string | null;

  @IsOptional()
  @IsString()
  imdb_id?: string | null;

  @IsOptional()
  @IsNumber()
  vote_average?: number | null;

  @IsOptional()
  @IsNumber()
  vote_count?: number | null;
}

export class TmdbSearchResponseDto {
  @IsArray()
  results!: unknown[];
}

export class TmdbFindResponseDto {
  @IsArray()
  movie_results!: unknown[];
}

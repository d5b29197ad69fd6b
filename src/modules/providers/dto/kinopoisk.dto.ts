import { IsArray, IsInt, IsNumber, IsOptional, IsString } from 'class-validator';

export class KinopoiskFilmDto {
  @IsInt()
  kinopoiskId!: number;

  @IsOptional()
  @IsString()
  imdbId?: string | null;

  @IsOptional()
  @IsString()
  nameRu?: string | null;

  @IsOptional()
  @IsString()
  nameOriginal?: string | null;

  @IsOptional()
  @IsString()
  nameEn?: string | null;

  @IsOptional()
  @IsInt()
  year?: number | null;

  @IsOptional()
  @IsNumber()
  ratingKinopoisk?: number | null;

  @IsOptional()
  @IsInt()
  ratingKinopoiskVoteCount?: number | null;

  @IsOptional()
  @IsNumber()
  ratingImdb?: number | null;

  @IsOptional()
  @IsInt()
  ratingImdbVoteCount?: number | null;

  @IsOptional()
  @IsNumber()
  ratingFilmCritics?: number | null;

  @IsOptional()
  @IsInt()
  ratingFilmCriticsVoteCount?: number | null;
}

export class KinopoiskListDto {
  @IsArray()
  items!: unknown[];
}

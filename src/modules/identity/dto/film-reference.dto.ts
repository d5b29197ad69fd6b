import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Matches, Max, Min, ValidateNested } from 'class-validator';
import { SecondaryProviderTag } from '../../providers/dto/provider-record.dto';

export const IMDB_ID_PATTERN = /^tt\d{5,10}$/;

export interface FilmReference {
  readonly primaryId?: string;
  readonly crossRefId?: string;
  readonly title?: string;
  readonly originalTitle?: string;
  readonly year?: number;
  /** Native IDs already known for secondary providers, e.g. from a previous run. */
  readonly nativeIds?: Readonly<Partial<Record<SecondaryProviderTag, string>>>;
}

export class InvalidReferenceError extends Error {
  readonly name = 'InvalidReferenceError';
}

function clean(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Frozen reference with blank fields dropped. At least one of primary ID,
 * cross-reference ID, title or original title must remain.
 */
export function createFilmReference(input: {
  primaryId?: string | null;
  crossRefId?: string | null;
  title?: string | null;
  originalTitle?: string | null;
  year?: number | null;
  nativeIds?: Partial<Record<SecondaryProviderTag, string | null | undefined>>;
}): FilmReference {
  const nativeIds: Partial<Record<SecondaryProviderTag, string>> = {};
  for (const tag of ['ratings', 'regional'] as const) {
    const id = clean(input.nativeIds?.[tag]);
    if (id) nativeIds[tag] = id;
  }

  const reference: FilmReference = {
    primaryId: clean(input.primaryId),
    crossRefId: clean(input.crossRefId),
    title: clean(input.title),
    originalTitle: clean(input.originalTitle),
    year: input.year !== null && input.year !== undefined && Number.isInteger(input.year) ? input.year : undefined,
    nativeIds: Object.keys(nativeIds).length ? Object.freeze(nativeIds) : undefined,
  };

  if (!reference.primaryId && !reference.crossRefId && !reference.title && !reference.originalTitle) {
    throw new InvalidReferenceError('Film reference needs a primary ID, a cross-reference ID or a title');
  }
  return Object.freeze(reference);
}

export class NativeIdsDto {
  @IsOptional()
  @IsString()
  ratings?: string;

  @IsOptional()
  @IsString()
  regional?: string;
}

export class FilmReferenceDto {
  @IsOptional()
  @IsString()
  primaryId?: string;

  @IsOptional()
  @Matches(IMDB_ID_PATTERN)
  crossRefId?: string;

  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @IsString()
  originalTitle?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1870)
  @Max(2100)
  year?: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => NativeIdsDto)
  nativeIds?: NativeIdsDto;
}

import { ProviderRecord, ProviderTag, RawRating } from '../dto/provider-record.dto';

export interface RecordFields {
  nativeId: string;
  title: string;
  originalTitle?: string | null;
  year?: number | null;
  crossRefId?: string | null;
  ratings?: RawRating[];
}

function clean(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function createProviderRecord(provider: ProviderTag, fields: RecordFields): ProviderRecord {
  return Object.freeze({
    provider,
    nativeId: fields.nativeId,
    title: fields.title.trim(),
    originalTitle: clean(fields.originalTitle),
    year: fields.year ?? null,
    crossRefId: clean(fields.crossRefId),
    ratings: Object.freeze([...(fields.ratings ?? [])]),
  });
}

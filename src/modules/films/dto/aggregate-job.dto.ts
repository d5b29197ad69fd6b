import { SecondaryProviderTag } from '../../providers/dto/provider-record.dto';

export interface AggregateJobData {
  reference: {
    primaryId?: string;
    crossRefId?: string;
    title?: string;
    originalTitle?: string;
    year?: number;
    nativeIds?: Partial<Record<SecondaryProviderTag, string>>;
  };
}

export interface AggregateJobResult {
  filmId: number;
  compositeRating: number | null;
  ratingsCount: number;
}

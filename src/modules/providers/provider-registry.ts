import { Injectable } from '@nestjs/common';
import { KinopoiskAdapter } from './adapters/kinopoisk.adapter';
import { OmdbAdapter } from './adapters/omdb.adapter';
import { TmdbAdapter } from './adapters/tmdb.adapter';
import { BaseCatalogAdapter } from './adapters/base-catalog.adapter';
import { ProviderTag, SecondaryProviderTag } from './dto/provider-record.dto';

@Injectable()
export class ProviderRegistry {
  constructor(
    readonly primary: TmdbAdapter,
    readonly ratings: OmdbAdapter,
    readonly regional: KinopoiskAdapter,
  ) {}

  get(tag: ProviderTag): BaseCatalogAdapter {
    return this[tag];
  }

  secondaries(): Array<[SecondaryProviderTag, BaseCatalogAdapter]> {
    return [
      ['ratings', this.ratings],
      ['regional', this.regional],
    ];
  }

  /** Every gateway shares one response cache, so any adapter can clear it. */
  clearAllCache(): Promise<number> {
    return this.primary.clearAllCache();
  }
}

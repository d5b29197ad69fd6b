import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { errorMessage } from '../../common/error-message';
import { PROVIDER_TAGS, ProviderTag } from '../providers/dto/provider-record.dto';
import { ProviderRegistry } from '../providers/provider-registry';

export type ProbeStatus = 'ok' | 'down';

export interface HealthReport {
  status: 'ok' | 'degraded';
  db: ProbeStatus;
  providers: Record<ProviderTag, ProbeStatus>;
}

export const PROBE_QUERY = 'test';

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly providers: ProviderRegistry,
  ) {}

  async check(): Promise<HealthReport> {
    let db: ProbeStatus = 'ok';
    try {
      await this.dataSource.query('SELECT 1');
    } catch (error) {
      this.logger.warn(`[HEALTH] db down error=${errorMessage(error)}`);
      db = 'down';
    }

    const probes = await Promise.all(PROVIDER_TAGS.map((tag) => this.probe(tag)));
    const providers: Record<ProviderTag, ProbeStatus> = { primary: 'down', ratings: 'down', regional: 'down' };
    PROVIDER_TAGS.forEach((tag, index) => {
      providers[tag] = probes[index];
    });

    const healthy = db === 'ok' && probes.every((status) => status === 'ok');
    return { status: healthy ? 'ok' : 'degraded', db, providers };
  }

  // uncached, single attempt
  private async probe(tag: ProviderTag): Promise<ProbeStatus> {
    try {
      await this.providers.get(tag).searchByTitle(PROBE_QUERY, null, 1, { useCache: false, maxRetries: 1 });
      return 'ok';
    } catch (error) {
      this.logger.warn(`[HEALTH] provider down provider=${tag} error=${errorMessage(error)}`);
      return 'down';
    }
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';

import type { GithubClient } from '../github/github-client.interface.js';
import { GITHUB_CLIENT } from '../github/github-client.token.js';
import { SettingsService } from '../settings/settings.service.js';
import { normalizeName } from '../settings/settings.js';

// week_12_hr_experts -> hr_experts
const DOMAIN_WEEK_FOLDER = /^week_\d+_(.+)$/;

/**
 * The known-domain allow-list used by title repair. Readers take `known`
 * on every use; refreshes swap in a new frozen set.
 */
@Injectable()
export class DomainCatalogService {
  private readonly logger = new Logger(DomainCatalogService.name);
  private snapshot: ReadonlySet<string>;

  constructor(
    private readonly settings: SettingsService,
    @Inject(GITHUB_CLIENT) private readonly github: GithubClient,
  ) {
    this.snapshot = new Set(settings.current.allowedDomains);
  }

  get known(): ReadonlySet<string> {
    return this.snapshot;
  }

  /** Re-reads the repository root and unions its domain-qualified week folders with the configured list. */
  async refreshFromSource(): Promise<ReadonlySet<string>> {
    const entries = await this.github.listDirectory({ path: '' });

    const discovered = entries
      .filter((e) => e.type === 'dir')
      .map((e) => DOMAIN_WEEK_FOLDER.exec(e.name))
      .filter((m): m is RegExpExecArray => m !== null)
      .map((m) => normalizeName(m[1]));

    const next = new Set([...this.settings.current.allowedDomains, ...discovered]);
    const added = [...next].filter((d) => !this.snapshot.has(d));

    this.snapshot = next;
    if (added.length > 0) {
      this.logger.log(`Known domains updated, added: ${added.sort().join(', ')}`);
    } else {
      this.logger.debug(`Known domains unchanged (${next.size})`);
    }
    return next;
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { AppSettings, parseSettings } from './settings.js';

/**
 * Holds the process-wide configuration as an immutable snapshot.
 * Readers always call `current` rather than caching the object, so a
 * `reload()` is picked up by every worker on its next read.
 */
@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);
  private snapshot: AppSettings;

  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {
    this.snapshot = parseSettings(source);
  }

  get current(): AppSettings {
    return this.snapshot;
  }

  reload(source: NodeJS.ProcessEnv = this.source): AppSettings {
    const next = parseSettings(source);
    this.snapshot = next;
    this.logger.log(`Settings reloaded for ${next.github.owner}/${next.github.repo}`);
    return next;
  }
}

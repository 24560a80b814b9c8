/**
 * @module publishing/connectors
 * Built-in platform connectors and the enabled-set factory.
 */

import type { PublishingConfig } from '../../config.js';
import type { Logger } from '../../context.js';
import type { PlatformConnector } from '../platform.js';
import { Art19Connector } from './art19.js';
import { TwitterConnector } from './twitter.js';
import { WebsiteConnector } from './website.js';

export { Art19Connector } from './art19.js';
export { WebsiteConnector, websiteRecord } from './website.js';
export { TwitterConnector, defaultPost, truncatePost, weightedLength, MAX_POST_LENGTH } from './twitter.js';

/**
 * Build the enabled platform set from config, in launch order
 * (art19, website, twitter). Platforms switched on but missing credentials
 * are left out with a warning.
 */
export function createEnabledPlatforms(config: PublishingConfig, logger?: Logger): PlatformConnector[] {
  const candidates: Array<[boolean, PlatformConnector]> = [
    [config.art19.enabled, new Art19Connector(config.art19)],
    [config.website.enabled, new WebsiteConnector(config.website)],
    [config.twitter.enabled, new TwitterConnector(config.twitter)],
  ];

  const enabled: PlatformConnector[] = [];
  for (const [on, connector] of candidates) {
    if (!on) continue;
    if (!connector.isAvailable()) {
      logger?.warn(`Platform ${connector.name} is enabled but not configured; skipping`);
      continue;
    }
    enabled.push(connector);
  }
  return enabled;
}

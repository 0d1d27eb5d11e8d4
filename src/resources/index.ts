/**
 * Built-in resource migrators.
 */
import { MigratorRegistry } from '../core/registry/migrator-registry.js';
import { DeviceProfileMigrator } from './device-profile/v4-to-v5.js';
import { DEVICE_PROFILE_KINDS } from './device-profile/kinds.js';
import { SplitTunnelMigrator, SPLIT_TUNNEL_KIND } from './split-tunnel/v4-to-v5.js';

export { DeviceProfileMigrator } from './device-profile/v4-to-v5.js';
export {
  SplitTunnelMigrator,
  SPLIT_TUNNEL_KIND,
  SPLIT_TUNNEL_MERGE_RULE,
  mergeSplitTunnelsInConfig,
  mergeSplitTunnelsInState,
} from './split-tunnel/v4-to-v5.js';
export * from './device-profile/kinds.js';

/**
 * Registry holding every built-in migrator.
 */
export function createDefaultRegistry(): MigratorRegistry {
  const registry = new MigratorRegistry();
  registry.register(DEVICE_PROFILE_KINDS, 'v4', 'v5', () => new DeviceProfileMigrator());
  registry.register([SPLIT_TUNNEL_KIND], 'v4', 'v5', () => new SplitTunnelMigrator());
  return registry;
}

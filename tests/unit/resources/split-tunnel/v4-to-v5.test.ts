/**
 * Tests for folding split tunnels into device profiles.
 */
import { describe, it, expect } from 'vitest';
import { migrateConfig } from '../../../../src/core/pipeline/config.js';
import { migrateState } from '../../../../src/core/pipeline/state.js';
import { createDefaultRegistry, SplitTunnelMigrator } from '../../../../src/resources/index.js';
import type { JsonObject } from '../../../../src/core/model/index.js';
import { Logger } from '../../../../src/utils/logger.js';

const logger = new Logger();
logger.setLevel('silent');
const options = { sourceVersion: 'v4', targetVersion: 'v5', logger };

const migrate = (content: string) => migrateConfig(content, 'main.tf', createDefaultRegistry(), options);

const DEFAULT_PROFILE = `resource "cloudflare_zero_trust_device_default_profile" "main" {
  account_id = var.account_id
}
`;

describe('split tunnel migration', () => {
  describe('configuration', () => {
    it('should fold an include split tunnel into the default profile', () => {
      const result = migrate(`resource "cloudflare_zero_trust_device_profiles" "default" {
  account_id = var.account_id
  default    = true
}

resource "cloudflare_split_tunnel" "include" {
  account_id = var.account_id
  mode       = "include"

  tunnels {
    address     = "10.0.0.0/8"
    description = "Corp"
  }
}
`);

      expect(result.content).toBe(`resource "cloudflare_zero_trust_device_default_profile" "default" {
  account_id = var.account_id
  include = [{
    address     = "10.0.0.0/8"
    description = "Corp"
  }]
  register_interface_ip_with_dns = true
  sccm_vpn_boundary_support = false
}
`);
      expect(result.diagnostics).toEqual([]);
    });

    it('should fold a referenced split tunnel into the right custom profile', () => {
      const result = migrate(`resource "cloudflare_zero_trust_device_profiles" "a" {
  match      = "a"
  precedence = 1
}

resource "cloudflare_zero_trust_device_profiles" "b" {
  match      = "b"
  precedence = 2
}

resource "cloudflare_split_tunnel" "b" {
  policy_id = cloudflare_zero_trust_device_profiles.b.id
  mode      = "exclude"

  tunnels {
    host = "intranet.example.com"
    address = "10.1.0.0/16"
  }
}
`);

      expect(result.content).toBe(`resource "cloudflare_zero_trust_device_custom_profile" "a" {
  match      = "a"
  precedence = 901
}

resource "cloudflare_zero_trust_device_custom_profile" "b" {
  match      = "b"
  precedence = 902
  exclude = [{
    address = "10.1.0.0/16"
    host    = "intranet.example.com"
  }]
}
`);
    });

    it('should keep the order of several exclude split tunnels', () => {
      const result = migrate(`${DEFAULT_PROFILE}
resource "cloudflare_split_tunnel" "first" {
  tunnels {
    address = "192.168.1.0/24"
  }
}

resource "cloudflare_split_tunnel" "second" {
  mode = "exclude"
  tunnels {
    address = "192.168.2.0/24"
  }
}
`);

      expect(result.content).toBe(`resource "cloudflare_zero_trust_device_default_profile" "main" {
  account_id = var.account_id
  exclude = [{
    address = "192.168.1.0/24"
  }, {
    address = "192.168.2.0/24"
  }]
}
`);
    });

    it('should not write empty collections', () => {
      const result = migrate(`${DEFAULT_PROFILE}
resource "cloudflare_split_tunnel" "empty" {
  mode = "include"
}
`);

      expect(result.content).toBe(DEFAULT_PROFILE);
      expect(result.diagnostics).toEqual([]);
    });

    it('should leave a warning when there is no profile to merge into', () => {
      const result = migrate(`resource "cloudflare_split_tunnel" "lonely" {
  mode = "include"
}
`);

      expect(result.content).toBe(`/** MIGRATION_WARNING: No default device profile found for split tunnel "lonely" - create cloudflare_zero_trust_device_default_profile resource first
*  resource "cloudflare_split_tunnel" "lonely" {
*    mode = "include"
*  }
*/

`);
      expect(result.diagnostics).toEqual([
        {
          level: 'warning',
          message:
            'No default device profile found for split tunnel "lonely" - create cloudflare_zero_trust_device_default_profile resource first',
          resource: 'cloudflare_split_tunnel.lonely',
          reason: 'no-default-target',
        },
      ]);
    });

    it('should leave a warning for a reference it cannot follow', () => {
      const result = migrate(`${DEFAULT_PROFILE}
resource "cloudflare_split_tunnel" "lost" {
  policy_id = var.policy_id
}
`);

      expect(result.content).toBe(`${DEFAULT_PROFILE}
/** MIGRATION_WARNING: Split tunnel "lost" has unparseable policy_id reference - manual migration required
*  resource "cloudflare_split_tunnel" "lost" {
*    policy_id = var.policy_id
*  }
*/

`);
    });

    it('should leave a warning for tunnels held in a variable', () => {
      const result = migrate(`${DEFAULT_PROFILE}
resource "cloudflare_split_tunnel" "vpn" {
  mode    = "include"
  tunnels = var.tunnels
}
`);

      expect(result.content).toBe(`${DEFAULT_PROFILE}
/** MIGRATION_WARNING: Split tunnel "vpn" has tunnels that cannot be read without evaluation - manual migration required
*  resource "cloudflare_split_tunnel" "vpn" {
*    mode    = "include"
*    tunnels = var.tunnels
*  }
*/

`);
      expect(result.diagnostics.map((d) => d.reason)).toEqual(['unreadable-entries']);
    });

    it('should produce the same bytes on a second run', () => {
      const first = migrate(`resource "cloudflare_zero_trust_device_profiles" "default" {
  default = true
}

resource "cloudflare_split_tunnel" "corp" {
  mode = "include"
  tunnels {
    address = "10.0.0.0/8"
  }
}

resource "cloudflare_split_tunnel" "lost" {
  policy_id = local.policy
}
`).content;

      const second = migrate(first);

      expect(second.changed).toBe(false);
      expect(second.content).toBe(first);
    });
  });

  describe('state', () => {
    function tunnel(name: string, attributes: JsonObject): JsonObject {
      return { mode: 'managed', type: 'cloudflare_split_tunnel', name, instances: [{ attributes }] };
    }

    it('should report split tunnels whose profile is missing', () => {
      const content = JSON.stringify({
        version: 4,
        resources: [
          {
            mode: 'managed',
            type: 'cloudflare_zero_trust_device_default_profile',
            name: 'main',
            instances: [{ attributes: { account_id: 'acc-1' } }],
          },
          tunnel('r', { account_id: 'acc-1', policy_id: 'missing', tunnels: [{ address: '10.0.0.0/8' }] }),
        ],
      });

      const result = migrateState(content, createDefaultRegistry(), options);

      expect(result.diagnostics).toEqual([
        {
          level: 'warning',
          message: 'Split tunnel "r" references profile "missing" which was not found - manual migration required',
          resource: 'cloudflare_split_tunnel.r',
          reason: 'target-not-found',
        },
      ]);
      expect(JSON.parse(result.content).resources.map((r: JsonObject) => r.type)).toEqual([
        'cloudflare_zero_trust_device_default_profile',
      ]);
    });

    it('should merge into an already split default profile', () => {
      const content = JSON.stringify({
        version: 4,
        resources: [
          {
            mode: 'managed',
            type: 'cloudflare_zero_trust_device_default_profile',
            name: 'main',
            instances: [{ schema_version: 0, attributes: { account_id: 'acc-1' } }],
          },
          tunnel('r', { account_id: 'acc-1', mode: 'include', tunnels: [{ address: '10.0.0.0/8' }] }),
        ],
      });

      const result = migrateState(content, createDefaultRegistry(), options);

      expect(JSON.parse(result.content).resources).toEqual([
        {
          mode: 'managed',
          type: 'cloudflare_zero_trust_device_default_profile',
          name: 'main',
          instances: [{ schema_version: 0, attributes: { account_id: 'acc-1', include: [{ address: '10.0.0.0/8' }] } }],
        },
      ]);
    });
  });

  describe('SplitTunnelMigrator', () => {
    it('should drop instances left over after the merge', () => {
      expect(
        new SplitTunnelMigrator().transformState(
          {},
          { index: 0, type: 'cloudflare_split_tunnel', name: 'x', value: {} }
        )
      ).toEqual({ instance: null });
    });
  });
});

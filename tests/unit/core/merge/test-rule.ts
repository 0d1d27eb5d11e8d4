/**
 * A merge rule over made-up kinds, so the engine is exercised without any
 * provider's names.
 */
import type { MergeRule } from '../../../../src/core/merge/types.js';

export const TEST_RULE: MergeRule = {
  id: 'route-merge',
  satelliteKind: 'example_route',
  legacyKinds: ['example_policy'],
  defaultKind: 'example_default_policy',
  customKind: 'example_custom_policy',
  candidateKinds: ['example_custom_policy', 'example_policy', 'example_default_policy'],
  classifierFields: { isDefault: 'default', match: 'match', precedence: 'precedence' },
  referenceAttribute: 'policy_id',
  modeAttribute: 'mode',
  defaultMode: 'exclude',
  entryField: 'routes',
  entryKeyField: 'address',
  entryOptionalFields: ['description', 'host'],
  collections: [
    { mode: 'include', collection: 'include' },
    { mode: 'exclude', collection: 'exclude' },
  ],
  labels: {
    satellite: 'Route',
    primary: 'policy',
    defaultPrimary: 'default policy',
  },
};

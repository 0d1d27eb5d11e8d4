/**
 * Device profiles, v4 to v5.
 *
 * The v4 unified kind (and its deprecated alias) splits into a default
 * profile and custom profiles. Split tunnels are folded into the profiles
 * before any profile is rewritten.
 */
import { parseValue } from '../../core/hcl/literal.js';
import { resourceLabels, type Block, type Body } from '../../core/hcl/tree.js';
import { bodyAttributeView } from '../../core/hcl/view.js';
import { classifyAttributes } from '../../core/merge/classifier.js';
import type { Variant } from '../../core/merge/types.js';
import { asNumber, asString, boolValue, jsonAttributeView, numberValue } from '../../core/model/attribute-value.js';
import { isJsonObject, type JsonObject } from '../../core/model/json.js';
import type { StateDocument, StateResource } from '../../core/state/document.js';
import {
  ensureAttribute,
  moveAttributesToNestedObject,
  removeAttributes,
  renameResourceType,
} from '../../core/transform/attributes.js';
import { coerceNumberField, removeFields, toNumber } from '../../core/transform/state-fields.js';
import type {
  ConfigContext,
  ResourceMigrator,
  StateContext,
  StateTransformResult,
} from '../../core/transform/types.js';
import {
  mergeSplitTunnelsInConfig,
  mergeSplitTunnelsInState,
  SPLIT_TUNNEL_MERGE_RULE,
} from '../split-tunnel/v4-to-v5.js';
import {
  CUSTOM_PROFILE_KIND,
  DEFAULT_PROFILE_KIND,
  DEVICE_PROFILE_KINDS,
  LEGACY_PROFILE_KINDS,
} from './kinds.js';

/** Custom profile precedence moves above the range reserved in v5 */
const PRECEDENCE_OFFSET = 900;

const DEFAULT_PROFILE_REMOVED = ['name', 'description', 'match', 'precedence', 'enabled', 'default'];
const CUSTOM_PROFILE_REMOVED = ['default', 'enabled'];

const SERVICE_MODE = 'service_mode_v2_mode';
const SERVICE_PORT = 'service_mode_v2_port';
const SERVICE_MODE_OBJECT = 'service_mode_v2';
/** Mode that needs no port and is the v5 default */
const WARP_MODE = 'warp';

function isLegacyKind(kind: string): boolean {
  return LEGACY_PROFILE_KINDS.some((legacy) => legacy === kind);
}

function kindFor(variant: Variant): string {
  return variant === 'custom' ? CUSTOM_PROFILE_KIND : DEFAULT_PROFILE_KIND;
}

/** `900 + <precedence>`, folded when the precedence is a literal number. */
function offsetPrecedence(body: Body): void {
  const attr = body.getAttribute('precedence');
  if (!attr) return;
  const value = asNumber(parseValue(attr.expression));
  if (value !== undefined) {
    body.setAttributeValue('precedence', numberValue(PRECEDENCE_OFFSET + value));
  } else {
    const operand = /^[\w.[\]"-]+$/.test(attr.expression) ? attr.expression : `(${attr.expression})`;
    body.setAttributeRaw('precedence', `${PRECEDENCE_OFFSET} + ${operand}`);
  }
}

function nestServiceModeInConfig(body: Body): void {
  const mode = body.getAttribute(SERVICE_MODE);
  if (mode && !body.hasAttribute(SERVICE_PORT) && asString(parseValue(mode.expression)) === WARP_MODE) {
    body.removeAttribute(SERVICE_MODE);
  }
  moveAttributesToNestedObject(body, SERVICE_MODE_OBJECT, [
    [SERVICE_MODE, 'mode'],
    [SERVICE_PORT, 'port'],
  ]);
}

function nestServiceModeInState(attributes: JsonObject): void {
  const hasMode = Object.prototype.hasOwnProperty.call(attributes, SERVICE_MODE);
  const hasPortField = Object.prototype.hasOwnProperty.call(attributes, SERVICE_PORT);
  const mode = attributes[SERVICE_MODE];
  const port = hasPortField ? toNumber(attributes[SERVICE_PORT]) : null;
  const hasPort = typeof port === 'number' && port !== 0;

  if (mode === WARP_MODE && !hasPort) {
    removeFields(attributes, SERVICE_MODE, SERVICE_PORT);
    return;
  }

  const serviceMode: JsonObject = {};
  if (typeof mode === 'string' && mode !== '') serviceMode.mode = mode;
  if (hasPort) serviceMode.port = port;
  if (Object.keys(serviceMode).length === 0) return;

  attributes[SERVICE_MODE_OBJECT] = serviceMode;
  if (hasMode) delete attributes[SERVICE_MODE];
  if (hasPortField) delete attributes[SERVICE_PORT];
}

export class DeviceProfileMigrator implements ResourceMigrator {
  readonly kinds = DEVICE_PROFILE_KINDS;
  readonly sourceVersion = 'v4';
  readonly targetVersion = 'v5';

  /**
   * Profiles already of a v5 kind only take part in the split tunnel
   * merge, so re-running on migrated files changes nothing.
   */
  transformConfig(block: Block, ctx: ConfigContext): void {
    mergeSplitTunnelsInConfig(ctx);

    const labels = resourceLabels(block);
    if (!labels || !isLegacyKind(labels.kind)) return;

    const { body } = block;
    const variant = classifyAttributes(bodyAttributeView(body), SPLIT_TUNNEL_MERGE_RULE.classifierFields);
    renameResourceType(block, kindFor(variant));

    if (variant === 'custom') {
      offsetPrecedence(body);
      removeAttributes(body, ...CUSTOM_PROFILE_REMOVED);
    } else {
      removeAttributes(body, ...DEFAULT_PROFILE_REMOVED);
    }

    nestServiceModeInConfig(body);

    if (variant === 'default') {
      ensureAttribute(body, 'register_interface_ip_with_dns', boolValue(true));
      ensureAttribute(body, 'sccm_vpn_boundary_support', boolValue(false));
    }

    ctx.logger.debug(`${labels.kind}.${labels.name} -> ${kindFor(variant)}.${labels.name}`);
  }

  preprocessState(doc: StateDocument, ctx: StateContext): void {
    mergeSplitTunnelsInState(doc, ctx);
  }

  transformState(instance: JsonObject, resource: StateResource): StateTransformResult {
    if (!isLegacyKind(resource.type)) return { instance };

    const { attributes } = instance;
    if (!isJsonObject(attributes)) {
      instance.schema_version = 0;
      return { instance, resourceType: DEFAULT_PROFILE_KIND };
    }

    const variant = classifyAttributes(jsonAttributeView(attributes), SPLIT_TUNNEL_MERGE_RULE.classifierFields);
    removeFields(attributes, ...(variant === 'custom' ? CUSTOM_PROFILE_REMOVED : DEFAULT_PROFILE_REMOVED));
    removeFields(attributes, 'fallback_domains');

    const exclude = attributes.exclude;
    if (Array.isArray(exclude) && exclude.length === 0) removeFields(attributes, 'exclude');

    coerceNumberField(attributes, 'auto_connect');
    coerceNumberField(attributes, 'captive_portal');

    if (variant === 'custom') {
      coerceNumberField(attributes, 'precedence');
      const id = attributes.id;
      const slash = typeof id === 'string' ? id.indexOf('/') : -1;
      if (typeof id === 'string' && slash >= 0 && slash < id.length - 1) {
        attributes.policy_id = id.slice(slash + 1);
      }
    }

    nestServiceModeInState(attributes);
    instance.schema_version = 0;
    return { instance, resourceType: kindFor(variant) };
  }
}

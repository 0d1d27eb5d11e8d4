/**
 * Device profile resource kinds across provider generations.
 */

/** v4 unified kind */
export const DEVICE_PROFILES_KIND = 'cloudflare_zero_trust_device_profiles';
/** v4 deprecated alias of the unified kind */
export const DEVICE_SETTINGS_POLICY_KIND = 'cloudflare_device_settings_policy';
export const DEFAULT_PROFILE_KIND = 'cloudflare_zero_trust_device_default_profile';
export const CUSTOM_PROFILE_KIND = 'cloudflare_zero_trust_device_custom_profile';

export const LEGACY_PROFILE_KINDS = [DEVICE_PROFILES_KIND, DEVICE_SETTINGS_POLICY_KIND] as const;

/** Every kind the device profile migrator handles */
export const DEVICE_PROFILE_KINDS = [...LEGACY_PROFILE_KINDS, DEFAULT_PROFILE_KIND, CUSTOM_PROFILE_KIND] as const;

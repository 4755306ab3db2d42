/**
 * Platform Configuration
 *
 * Each game and platform has its own API endpoint. All of them share the
 * same signing and session scheme.
 */

export const PLATFORMS = [
  'smite-pc',
  'smite-xbox',
  'smite-ps4',
  'paladins-pc',
  'paladins-xbox',
  'paladins-ps4',
] as const;

export type Platform = (typeof PLATFORMS)[number];

export const PLATFORM_BASE_URLS: Record<Platform, string> = {
  'smite-pc': 'https://api.smitegame.com/smiteapi.svc',
  'smite-xbox': 'https://api.xbox.smitegame.com/smiteapi.svc',
  'smite-ps4': 'https://api.ps4.smitegame.com/smiteapi.svc',
  'paladins-pc': 'https://api.paladins.com/paladinsapi.svc',
  'paladins-xbox': 'https://api.xbox.paladins.com/paladinsapi.svc',
  'paladins-ps4': 'https://api.ps4.paladins.com/paladinsapi.svc',
};

export const DEFAULT_PLATFORM: Platform = 'smite-pc';

/**
 * Resolve the base URL for a platform (defaults to Smite PC)
 */
export function getBaseUrl(platform: Platform = DEFAULT_PLATFORM): string {
  return PLATFORM_BASE_URLS[platform];
}

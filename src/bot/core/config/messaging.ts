import type { BotMessagingConfig } from "../../schema/flowDslTypes.js";

let botMessagingConfig: BotMessagingConfig | null = null;

export function setBotMessagingConfig(config: BotMessagingConfig): void {
  botMessagingConfig = config;
}

export function clearBotMessagingConfig(): void {
  botMessagingConfig = null;
}

export function getBotMessagingConfig(): BotMessagingConfig | null {
  return botMessagingConfig;
}

/**
 * Retrieve a named string from the loaded messaging config.
 * Returns the hardcoded `fallback` when no config is loaded or the key is missing.
 */
export function configString(key: string, fallback: string): string {
  return botMessagingConfig?.strings[key] ?? fallback;
}

export function confirmBeforeSave(): boolean {
  return botMessagingConfig?.registration.confirmBeforeSave ?? false;
}

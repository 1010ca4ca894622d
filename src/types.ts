export type * from "./types/config";

import type { KilnConfig } from "./types/config";

export function defineConfig(config: KilnConfig): KilnConfig;
export function defineConfig(
  config: (env: { mode: string }) => KilnConfig | Promise<KilnConfig>
): KilnConfig | Promise<KilnConfig>;
export function defineConfig(
  config: KilnConfig | ((env: { mode: string }) => KilnConfig | Promise<KilnConfig>)
): KilnConfig | Promise<KilnConfig> {
  if (typeof config === "function") {
    return config({ mode: process.env.NODE_ENV || "production" });
  }
  return config;
}

/**
 * packages/core/src/warnings.ts — Development warning sink.
 *
 * Why: Unhandled input and off-screen responders are not errors, but a host
 * developer needs to see them. Output is silenced under NODE_ENV=production and
 * can be redirected per screen.
 */

export type WarnFn = (message: string) => void;

export type WarnArea = "events" | "screen";

const DEV_MODE = (process.env["NODE_ENV"] ?? "development") !== "production";

/** Default sink: console.warn in development, no-op in production. */
export function defaultWarn(message: string): void {
  if (!DEV_MODE) return;
  console.warn(message);
}

export function formatWarning(area: WarnArea, detail: string): string {
  return `[panelkit][${area}] ${detail}`;
}

import { PROGRAM_NAME } from "./constants";

let debugMode = false;

const PREFIX = `[${PROGRAM_NAME}]`;

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

export function isDebugEnabled(): boolean {
  return debugMode;
}

export function debugLog(...args: unknown[]): void {
  if (debugMode) {
    console.log(PREFIX, ...args);
  }
}

export function debugWarn(...args: unknown[]): void {
  if (debugMode) {
    console.warn(PREFIX, ...args);
  }
}

export function debugError(...args: unknown[]): void {
  if (debugMode) {
    console.error(PREFIX, ...args);
  }
}

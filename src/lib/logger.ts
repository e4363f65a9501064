// src/lib/logger.ts

const format = (data?: unknown): string => {
  if (data === undefined) return "";
  if (data instanceof Error) return `${data.name}: ${data.message}`;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
};

export interface ScopedLog {
  info: (msg: string, data?: unknown) => void;
  success: (msg: string, data?: unknown) => void;
  warn: (msg: string, data?: unknown) => void;
  error: (msg: string, data?: unknown) => void;
}

export const createLog = (scope: string): ScopedLog => ({
  info: (msg, data) => console.log(`ℹ️  [${scope}] ${msg}`, format(data)),
  success: (msg, data) => console.log(`✅ [${scope}] ${msg}`, format(data)),
  warn: (msg, data) => console.warn(`⚠️  [${scope}] ${msg}`, format(data)),
  error: (msg, data) => console.error(`❌ [${scope}] ${msg}`, format(data)),
});

//--------------------------------------------------------------
// FILE: src/utils/logger.ts
// Companion logger: quiet when it should be, loud when it matters
//--------------------------------------------------------------

function ts() {
  return new Date().toISOString();
}

function tag(level: string) {
  return `[${ts()}][Companion][${level}]`;
}

export const logger = {
  info: (...args: unknown[]) => console.log(`ℹ️ ${tag("INFO")}`, ...args),
  warn: (...args: unknown[]) => console.warn(`⚠️ ${tag("WARN")}`, ...args),
  error: (...args: unknown[]) => console.error(`❌ ${tag("ERROR")}`, ...args),

  debug: (...args: unknown[]) => {
    if (process.env.DEBUG === "true") {
      console.log(`🐛 ${tag("DEBUG")}`, ...args);
    }
  },
};

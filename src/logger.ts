/**
 * Simple logger for debug output. Enabled by setting `JINA_DEBUG`.
 */
export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (process.env.JINA_DEBUG) {
      console.debug(`[jina] ${message}`, ...args);
    }
  },
};

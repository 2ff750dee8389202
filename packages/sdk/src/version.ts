/**
 * Package version, reported by `pipecloud --version`
 */
export const VERSION = "0.3.0";

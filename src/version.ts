export const TOOL_NAME = 'locize-backup';
export const TOOL_VERSION = '1.0.0';

export const PROGRAM_NAME = "recent-folders";
export const VERSION = "1.0.0";

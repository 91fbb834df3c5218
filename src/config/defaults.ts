export const DEFAULT_THRESHOLD = 80;

// A pair that shares no tokens scores 0 and is left unpaired.
export const DEFAULT_MIN_PAIR_SCORE = 1;

export const OUTPUT_FORMATS = ["text", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const DEFAULT_OUTPUT_FORMAT: OutputFormat = "text";

export const CONFIG_FILE_NAMES = ["snipcheck.config.json", ".snipcheckrc.json"];

export const STATE_DIR_NAME = ".snipcheck";

export class ConfigInvalidThresholdError extends Error {
  constructor(key: string, value: unknown) {
    super(`Invalid ${key}: expected an integer between 0 and 100, got ${JSON.stringify(value)}.`);
    this.name = "ConfigInvalidThresholdError";
  }
}

export class ConfigInvalidFormatError extends Error {
  constructor(value: unknown) {
    super(`Invalid output format ${JSON.stringify(value)}. Use text or json.`);
    this.name = "ConfigInvalidFormatError";
  }
}

export class ConfigFileInvalidError extends Error {
  constructor(filePath: string, message: string) {
    super(`Config file ${filePath} is not valid JSON: ${message}`);
    this.name = "ConfigFileInvalidError";
  }
}

/**
 * The values document is not syntactically valid YAML. Fatal for its element only.
 */
export class StructuralParseError extends Error {
  constructor(
    public readonly reason: string,
    public readonly line: number,
    public readonly documentId?: string
  ) {
    super(`${documentId ? `${documentId}: ` : ''}line ${line}: ${reason}`);
    this.name = 'StructuralParseError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly configPath?: string) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

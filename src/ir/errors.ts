/** Invalid decoder configuration (tick rate, protocol selection) */
export class ConfigurationError extends Error {
  constructor(
    public reason: string,
    public protocol: string | null = null
  ) {
    super(protocol ? `ir: ${protocol}: ${reason}` : `ir: ${reason}`);
    this.name = 'ConfigurationError';
  }
}

/** Malformed protocol timing data */
export class ProtocolSpecError extends Error {
  constructor(
    public reason: string,
    public entry: number = -1
  ) {
    super(entry >= 0 ? `ir: protocol table entry ${entry}: ${reason}` : `ir: protocol table: ${reason}`);
    this.name = 'ProtocolSpecError';
  }
}

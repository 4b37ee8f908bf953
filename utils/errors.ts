export class ParameterError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ParameterError';
    this.issues = issues;
  }
}

export class UnknownPresetError extends Error {
  readonly device: 'phone' | 'charger';
  readonly preset: number;

  constructor(device: 'phone' | 'charger', preset: number) {
    super(`Unknown ${device} preset ${preset} (use 0 for custom dimensions)`);
    this.name = 'UnknownPresetError';
    this.device = device;
    this.preset = preset;
  }
}

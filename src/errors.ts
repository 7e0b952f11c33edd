// src/errors.ts

export enum ErrorCode {
  // Configuration (1xxx)
  CONFIG_INVALID = 'E1000',
  CONFIG_UNKNOWN_RULE = 'E1001',
  CONFIG_UNREADABLE = 'E1002',
  USAGE = 'E1003',

  // Scanning (2xxx)
  SCAN_SYNTAX_ERROR = 'E2000',
  SCAN_UNSUPPORTED_FILE = 'E2001',

  // Rules (3xxx)
  RULE_DUPLICATE = 'E3000',
  RULE_FAILED = 'E3001',

  // Model (4xxx)
  MODEL_QUOTA = 'E4000',
  MODEL_BAD_RESPONSE = 'E4001',
  MODEL_NOT_CONFIGURED = 'E4002',
}

export class LintError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = 'LintError';
    this.code = code;
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

export class ConfigError extends LintError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFIG_INVALID) {
    super(message, code);
    this.name = 'ConfigError';
  }
}

export class ScanError extends LintError {
  public readonly filePath: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    message: string,
    location: { filePath: string; line?: number; column?: number },
    code: ErrorCode = ErrorCode.SCAN_SYNTAX_ERROR
  ) {
    super(message, code);
    this.name = 'ScanError';
    this.filePath = location.filePath;
    this.line = location.line;
    this.column = location.column;
  }
}

export class RuleError extends LintError {
  constructor(message: string, code: ErrorCode = ErrorCode.RULE_FAILED) {
    super(message, code);
    this.name = 'RuleError';
  }
}

export class ModelQuotaError extends LintError {
  constructor() {
    super('LLM call failed: insufficient quota.', ErrorCode.MODEL_QUOTA);
    this.name = 'ModelQuotaError';
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || String(e);
  return String(e);
}

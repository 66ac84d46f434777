import { BaseError } from './base.error';

/**
 * A flag or environment variable holds a value tendril does not accept
 */
export class InvalidSettingError extends BaseError {
  public readonly code = 'INVALID_SETTING';
  public readonly recoverable = true;
  public readonly setting: string;

  constructor(setting: string, details?: string) {
    super(`Invalid value for ${setting}`, details);
    this.setting = setting;
  }
}

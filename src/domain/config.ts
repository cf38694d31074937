export type ValidationMode = 'none' | 'strict';

export interface ProjectionConfig {
  version: string;
  displayDecimals: number;
  validation: ValidationMode;
}

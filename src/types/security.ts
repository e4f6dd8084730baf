export interface ResourceLimits {
  maxApiRequestSize: number; // in characters
}

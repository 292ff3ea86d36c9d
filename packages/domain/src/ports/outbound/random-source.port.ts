export interface RandomSource {
  /** Returns a float in [0, 1). */
  next(): number;
}

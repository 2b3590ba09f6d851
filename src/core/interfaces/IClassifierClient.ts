/**
 * Interface for the zero-shot bot classifier
 */
export interface IClassifierClient {
  /**
   * Probability in [0, 1] that the text was produced with a bot participating
   */
  classify(text: string): Promise<number>;
}

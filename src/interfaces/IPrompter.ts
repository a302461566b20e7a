/**
 * Interface for interactive yes/no confirmation
 */
export interface IPrompter {
  /**
   * Ask a question; resolves false when input is closed or cancelled
   */
  confirm(question: string): Promise<boolean>;
}

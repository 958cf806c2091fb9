/**
 * Capture Port - camera collaborator.
 */
export interface CapturePort {
  /**
   * Take photos for a detected tag.
   * Never rejects: hardware errors yield an empty list.
   */
  capture(tagId: string): Promise<string[]>;
}

/**
 * Thrown when a grid string cannot be turned into a board.
 * `position` is the 0-based index of the offending character, or null
 * when the grid has the wrong length.
 */
export class GridFormatError extends Error {
  readonly position: number | null;

  constructor(message: string, position: number | null = null) {
    super(message);
    this.name = "GridFormatError";
    this.position = position;
  }
}

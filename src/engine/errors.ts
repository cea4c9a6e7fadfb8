export type BoardErrorCode = "OUT_OF_BOUNDS" | "INVALID_DIMENSIONS" | "INVALID_LAYOUT";

export class BoardError extends Error {
  constructor(message: string, public code: BoardErrorCode) {
    super(message);
    this.name = "BoardError";
  }
}

export function outOfBounds(x: number, y: number, width: number, height: number): BoardError {
  return new BoardError(
    `Cell (${x}, ${y}) is outside the ${width}x${height} board`,
    "OUT_OF_BOUNDS",
  );
}

export function invalidDimensions(detail: string): BoardError {
  return new BoardError(`Invalid board dimensions: ${detail}`, "INVALID_DIMENSIONS");
}

export function invalidLayout(detail: string): BoardError {
  return new BoardError(`Invalid mine layout: ${detail}`, "INVALID_LAYOUT");
}

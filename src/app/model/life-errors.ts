export class LifeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidDimensionsError extends LifeError {
  constructor(readonly cols: number, readonly rows: number) {
    super(`Invalid grid dimensions ${cols}x${rows}: both must be positive integers.`);
  }
}

export class OutOfBoundsError extends LifeError {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly cols: number,
    readonly rows: number
  ) {
    super(`Cell (${x}, ${y}) is outside the ${cols}x${rows} grid.`);
  }
}

export class PatternFormatError extends LifeError {}

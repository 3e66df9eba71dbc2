export interface Location {
  readonly file: string;
  readonly function: string;
  readonly line: number;
}

const EMPTY_LOCATION: Location = Object.freeze({ file: '', function: '', line: 0 });

/**
 * Last known debuggee position. Each update swaps in a new frozen snapshot,
 * so a reader never sees a file from one stop and a line from another.
 */
export class LocationState {
  private current: Location = EMPTY_LOCATION;

  public update(location: Location): Location {
    this.current = Object.freeze({
      file: location.file,
      function: location.function,
      line: location.line,
    });
    return this.current;
  }

  public snapshot(): Location {
    return this.current;
  }

  public clear(): void {
    this.current = EMPTY_LOCATION;
  }
}

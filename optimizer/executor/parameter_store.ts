/**
 * Tunable parameter store the executor adjusts. Anything the surrounding
 * application wants optimized can sit behind this interface.
 */

export interface ParameterStore {
  get(name: string): number | undefined;
  set(name: string, value: number): void;
}

export class InMemoryParameterStore implements ParameterStore {
  private values = new Map<string, number>();

  constructor(initial: Record<string, number> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.values.set(name, value);
    }
  }

  get(name: string): number | undefined {
    return this.values.get(name);
  }

  set(name: string, value: number): void {
    this.values.set(name, value);
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.values);
  }
}

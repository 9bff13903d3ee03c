export type TestFn = () => void | Promise<void>;

export type TestCase = { name: string; fn: TestFn };

export const tests: TestCase[] = [];

/** Registers a test; names identify results, so they must be unique. */
export const test = (name: string, fn: TestFn): void => {
  if (tests.some((existing) => existing.name === name)) {
    throw new Error(`duplicate test name: ${name}`);
  }
  tests.push({ name, fn });
};

/**
 * Golden test types
 */

/**
 * `accepted`, or the diagnostic code the function must be rejected with
 */
export type Expectation = string;

export type TestEntry = {
  readonly input: string;
  readonly title: string;
  /** Function name → expected outcome */
  readonly expect: ReadonlyMap<string, Expectation>;
};

export type Scenario = TestEntry & {
  readonly category: string;
  readonly inputPath: string;
};

/**
 * Shared test types for the table-driven suites.
 */

/**
 * Represents a single row of data in a table-driven test.
 *
 * @template TInput - The type of the input passed to the function under test.
 * @template TExpected - The type of the expected result.
 */
export type TestScenario<TInput = unknown, TExpected = unknown> = {
  /**
   * A short, unique identifier for the scenario (e.g. "Leading Span Key").
   */
  id: string;

  /**
   * A human-readable explanation of the expected behavior.
   */
  description: string;

  /**
   * The input for the function under test.
   */
  input: TInput;

  /**
   * The expected output from the function under test.
   */
  expected: TExpected;
};

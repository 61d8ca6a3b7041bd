import { describe, expect, it, test } from 'vitest';
import {
  parseEmbeddedExpression,
  referencedBindings,
  unwrapExpression
} from '..';
import type { TestScenario } from '../../utils/tests/types';

describe('unwrapExpression', () => {
  const scenarios: TestScenario<unknown, string | null>[] = [
    {
      id: 'Whole Span',
      description: 'Body of a single span',
      input: '${a ? 1 : 2}',
      expected: 'a ? 1 : 2'
    },
    {
      id: 'Nested Braces',
      description: 'Object literal body',
      input: '${{ path: base }}',
      expected: '{ path: base }'
    },
    {
      id: 'Mixed',
      description: 'Span is only part of the value',
      input: '/content/${name}',
      expected: null
    },
    {
      id: 'Trailing Text',
      description: 'Text after the span',
      input: '${a}/b',
      expected: null
    },
    {
      id: 'Unbalanced',
      description: 'Span never closes',
      input: '${a',
      expected: null
    },
    {
      id: 'Non-String',
      description: 'Typed value',
      input: 3,
      expected: null
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(unwrapExpression(input)).toBe(expected);
  });
});

describe('parseEmbeddedExpression', () => {
  it('parses a single expression', () => {
    const result = parseEmbeddedExpression('${foo == bar ? 1 : 2}');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.expression.type).toBe('ConditionalExpression');
    }
  });

  it('rejects values that are not a single span', () => {
    expect(parseEmbeddedExpression('/content/${name}')).toEqual({
      success: false,
      reason: 'Value is not a single ${...} expression.'
    });
  });

  it('rejects bodies holding more than one statement', () => {
    expect(parseEmbeddedExpression('${a); b(}')).toEqual({
      success: false,
      reason: 'Body is not a single expression.'
    });
  });

  it('reports syntax errors without throwing', () => {
    const result = parseEmbeddedExpression('${a +}');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason.length).toBeGreaterThan(0);
    }
  });
});

describe('referencedBindings', () => {
  const scenarios: TestScenario<string, string[]>[] = [
    {
      id: 'Property Access',
      description: 'Computed access with a string key',
      input: "${vegetables['jcr:title']}",
      expected: ['vegetables']
    },
    {
      id: 'Ternary',
      description: 'Both sides of a comparison',
      input: '${foo == bar ? 1 : 2}',
      expected: ['foo', 'bar']
    },
    {
      id: 'Member Names',
      description: 'Non-computed member properties are not reads',
      input: '${json.test}',
      expected: ['json']
    },
    {
      id: 'Computed Member',
      description: 'Computed member properties are reads',
      input: '${list[index]}',
      expected: ['list', 'index']
    },
    {
      id: 'Object Keys',
      description: 'Object keys are not reads, values are',
      input: '${{ path: base }}',
      expected: ['base']
    },
    {
      id: 'Duplicates',
      description: 'Each name is listed once',
      input: '${a + a}',
      expected: ['a']
    },
    {
      id: 'Globals',
      description: 'Constructors are listed like any free name',
      input: '${new Date("2018-05-05T11:50:55")}',
      expected: ['Date']
    },
    {
      id: 'Arrow Parameters',
      description: 'Parameters of inner functions are not free',
      input: '${items.map(item => item.id)}',
      expected: ['items']
    },
    {
      id: 'Function Expression',
      description: 'Function name and parameters are not free',
      input: '${function f(x) { return x + y; }}',
      expected: ['y']
    },
    {
      id: 'Destructured Parameter',
      description: 'Names bound by a parameter pattern are not free',
      input: '${items.map(({ id }) => id)}',
      expected: ['items']
    },
    {
      id: 'Default Parameter',
      description: 'Parameters with a default value are not free',
      input: '${items.map((a = 1) => a)}',
      expected: ['items']
    },
    {
      id: 'Local Variable',
      description: 'Declarations inside an inner function are not free',
      input: '${(function () { var t = 1; return t + y; })()}',
      expected: ['y']
    },
    {
      id: 'Shadowed Name',
      description: 'A name stays free outside the function that shadows it',
      input: '${x + list.map(x => x).length}',
      expected: ['x', 'list']
    },
    {
      id: 'Literal',
      description: 'Values that are not embedded have no references',
      input: '/some/path',
      expected: []
    },
    {
      id: 'Syntax Error',
      description: 'Unparsable bodies have no references',
      input: '${a +}',
      expected: []
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(referencedBindings(input)).toEqual(expected);
  });
});

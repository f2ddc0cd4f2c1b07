import { assert, assertDefined, throwIllegalValue } from './assert';

test('assert', () => {
  expect(() => assert(true)).not.toThrow();
  expect(() => assert(1)).not.toThrow();
  expect(() => assert(false)).toThrow('Assertion failed');
  expect(() => assert(0, 'zero is not allowed')).toThrow(
    'zero is not allowed'
  );
});

test('assertDefined', () => {
  expect(assertDefined('value')).toEqual('value');
  expect(assertDefined(0)).toEqual(0);
  expect(() => assertDefined(undefined)).toThrow(
    'Expected value to be defined'
  );
  expect(() => assertDefined(null, 'missing')).toThrow('missing');
});

test('throwIllegalValue', () => {
  type Shape = 'circle' | 'square';
  function area(shape: Shape): number {
    switch (shape) {
      case 'circle':
        return Math.PI;
      case 'square':
        return 1;
      default:
        throwIllegalValue(shape);
    }
  }

  expect(area('square')).toEqual(1);
  expect(() => area(JSON.parse('"triangle"'))).toThrow(
    'Illegal value: "triangle"'
  );
});

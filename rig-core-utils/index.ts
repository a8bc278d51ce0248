export function assert(condition: unknown, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? 'Assertion failed.');
  }
}

export const checkNotNull = <V>(value: V | null | undefined, message?: string): V => {
  if (value == null) {
    throw new Error(message ?? `Value is asserted to be not null, but it is ${value}.`);
  }
  return value;
};

export const zip = <A, B>(
  list1: readonly A[],
  list2: readonly B[]
): readonly (readonly [A, B])[] => {
  assert(
    list1.length === list2.length,
    `Cannot zip lists of length ${list1.length} and ${list2.length}.`
  );
  return list1.map((element, index) => [element, list2[index]] as const);
};

export const isAligned = (value: number, alignment: number): boolean => value % alignment === 0;

export const alignUp = (value: number, alignment: number): number =>
  Math.ceil(value / alignment) * alignment;

export const alignDown = (value: number, alignment: number): number =>
  Math.floor(value / alignment) * alignment;

export * from './optional';
export { default as SortedNumberMap } from './sorted-number-map';
export * from './random';

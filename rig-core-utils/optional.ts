export type Some<T> = { readonly __type__: 'SOME'; readonly value: T };
export type None = { readonly __type__: 'NONE' };
export type Optional<T> = Some<T> | None;

export const SOME = <T>(value: T): Some<T> => ({ __type__: 'SOME', value });
export const NONE: None = { __type__: 'NONE' };

export const mapOptional = <T, R>(optional: Optional<T>, mapper: (value: T) => R): Optional<R> =>
  optional.__type__ === 'SOME' ? SOME(mapper(optional.value)) : NONE;

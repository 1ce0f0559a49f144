import type { Condition } from './types';

export type ContextGuard<T> = (context: unknown) => context is T;

/** Builds a Condition from a type guard and a predicate over the narrowed context. */
export function defineCondition<T>(
    accepts: ContextGuard<T>,
    evaluate: (context: T) => boolean,
    name?: string
): Condition<T> {
    return { name, accepts, evaluate };
}

/** Guard accepting instances of `ctor` and its subclasses. */
export function instanceOf<T>(ctor: new (...args: never[]) => T): ContextGuard<T> {
    return (context: unknown): context is T => context instanceof ctor;
}

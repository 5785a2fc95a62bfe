/**
 * Tagged error classes: `Error` subclasses carrying a literal `_tag`, so a
 * union of them can be narrowed with a plain `switch (error._tag)`.
 */

// =============================================================================
// Types
// =============================================================================

/** Shape shared by every tagged error instance. */
export interface TaggedErrorBase<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

/** Builds the `message` of a tagged error from its constructor props. */
export interface TaggedErrorOptions<Props> {
  /** Defaults to the tag itself. */
  message?: (props: Props) => string;
}

/** Second constructor argument of every tagged error class. */
export interface TaggedErrorCreateOptions {
  /** Underlying error, exposed as the standard `Error.cause`. */
  cause?: unknown;
}

/** Constructor returned by `TaggedError(tag, options)`; props land on the instance. */
export type TaggedErrorConstructor<Tag extends string, Props extends object> = new (
  props: Props,
  createOptions?: TaggedErrorCreateOptions
) => TaggedErrorBase<Tag> & Readonly<Props>;

/** Constructor returned by `TaggedError(tag)`; props are given as a type argument. */
export interface GenericTaggedErrorConstructor<Tag extends string> {
  new <Props extends object = Record<never, never>>(
    props: Props,
    createOptions?: TaggedErrorCreateOptions
  ): TaggedErrorBase<Tag> & Readonly<Props>;
}

/** Extract the tag from a tagged error type. */
export type TagOf<E> = E extends TaggedErrorBase<infer Tag> ? Tag : never;

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a base class for a tagged error. The props passed to the
 * constructor are copied onto the instance, so subclasses need no body.
 *
 * @example
 * ```typescript
 * class MissingHandler extends TaggedError("MissingHandler")<{ key: string }> {}
 *
 * class UnknownCodeError extends TaggedError("UnknownCodeError", {
 *   message: (p: { code: number }) => `No handler for ${p.code}`,
 * }) {}
 *
 * const error = new UnknownCodeError({ code: 7 });
 * error._tag; // "UnknownCodeError"
 * error.code; // 7
 * error.message; // "No handler for 7"
 * ```
 */
export function TaggedError<Tag extends string>(tag: Tag): GenericTaggedErrorConstructor<Tag>;
export function TaggedError<Tag extends string, Props extends object>(
  tag: Tag,
  options: TaggedErrorOptions<Props>
): TaggedErrorConstructor<Tag, Props>;
export function TaggedError(
  tag: string,
  options?: TaggedErrorOptions<object>
): new (props: object, createOptions?: TaggedErrorCreateOptions) => TaggedErrorBase {
  const message = options?.message ?? (() => tag);

  return class extends Error implements TaggedErrorBase {
    readonly _tag: string = tag;

    constructor(props: object, createOptions?: TaggedErrorCreateOptions) {
      super(
        message(props),
        createOptions && "cause" in createOptions ? { cause: createOptions.cause } : undefined
      );
      this.name = tag;
      Object.assign(this, props);
    }
  };
}

/**
 * Check whether a value is a tagged error, optionally with a specific tag.
 */
export function isTaggedError(value: unknown): value is TaggedErrorBase;
export function isTaggedError<Tag extends string>(
  value: unknown,
  tag: Tag
): value is TaggedErrorBase<Tag>;
export function isTaggedError(value: unknown, tag?: string): value is TaggedErrorBase {
  if (!(value instanceof Error) || !("_tag" in value)) return false;
  return tag === undefined ? typeof value._tag === "string" : value._tag === tag;
}

import type { buildValue } from './engine/value-builder';
import type { resolveFieldTypes } from './reflector';

/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * RATIONALE
 * 1. Explicit Type Descriptors
 *
 * DEFINITION
 * 2. Descriptor Ancestry
 *
 * LIFECYCLE
 * 3. Conversion Lifecycle
 *
 * STRATEGY
 * 4. Union Resolution
 * 5. Permissive Collection Fallback
 * 6. Deferred Reference Resolution
 *
 * POLICY
 * 7. Caller-Owned Failures
 * 8. Post-Construction Assignment
 * 9. Navigator Reads In Place
 *
 * Recommended reading flow:
 * RATIONALE -> DEFINITION -> LIFECYCLE -> STRATEGY -> POLICY
 */

/**
 * HEADER TAXONOMY
 *
 * - POLICY:
 *   Non-negotiable rule (`must` / `must not`) and enforcement semantics.
 *
 * - STRATEGY:
 *   Chosen implementation approach used to satisfy policies.
 *
 * - DEFINITION:
 *   Formal meaning and scope of a term or boundary.
 *
 * - RATIONALE:
 *   Why a policy or strategy exists.
 *
 * - LIFECYCLE:
 *   Step-by-step process flow across phases.
 */

/**
 * ARCHITECTURAL RATIONALE (1)
 * Explicit Type Descriptors
 *
 * ---
 *
 * TypeScript types are erased at compile time. A declaration such as
 *
 *   class Point { x!: number; y?: number | null }
 *
 * leaves nothing at runtime that says `x` is required or that `y` admits
 * null. Conversion therefore works against explicit descriptors built next
 * to the class:
 *
 *   const PointType = defineComposite(Point, {
 *     fields: { x: field(t.integer), y: field(t.optional(t.integer)) }
 *   });
 *
 * Consequences
 * ------------
 * - Dispatch is a `switch` over the descriptor's `kind` (`leaf`,
 *   `composite`, `union`, `collection`, `reference`); there is no
 *   `typeof`-driven guessing of the target.
 * - Leaves carry their own instance test and single-argument constructor,
 *   so branded strings, enumerations and schema-backed values are leaves
 *   like `string` is.
 * - Hooks and fieldPaths are keyed by descriptor identity. Two calls to
 *   `t.array(t.string)` are two descriptors; register the one the field
 *   declares.
 */
export type ExplicitTypeDescriptors = never;

/**
 * ARCHITECTURAL DEFINITION (2)
 * Descriptor Ancestry
 *
 * ---
 *
 * Casting and `allowSuperclasses` reason about "is an ancestor of". The
 * relation is reflexive and follows single-parent chains:
 *
 * - Leaves: `t.string <- CarCompany` (via `extend` or `t.leaf(..., parent)`);
 *   enumerations descend from `t.Enum`.
 * - Composites: `extends` in `defineComposite`.
 * - Collections: a collection descriptor sits under its origin;
 *   `collection <- sequence <- tuple`, `collection <- set`,
 *   `collection <- mapping`.
 *
 * `integer` and `number` are siblings. JavaScript has one number type, so
 * the runtime type of `2` is `integer` and of `2.5` is `number`; neither is
 * the parent of the other.
 *
 * Unions and references have no place in the graph.
 */
export type DescriptorAncestry = never;

/**
 * ARCHITECTURAL LIFECYCLE (3)
 * Conversion Lifecycle
 *
 * ---
 *
 * 1. Entry
 *    `fromMapping` checks that the input is a mapping and resolves the
 *    configuration (options are normalized, validated and frozen once).
 *
 * 2. Assembly (per composite)
 *    Fields are reflected ({@link resolveFieldTypes}, cached), undeclared
 *    keys are rejected in strict mode, and each field takes its raw value
 *    from a remapped path, a direct key or its default.
 *
 * 3. Building (per value)
 *    {@link buildValue} applies the exact-descriptor hook, short-circuits
 *    `null` for unions admitting it, dispatches by kind (recursing into
 *    unions, collections and nested composites), then casts or parses type
 *    hints.
 *
 * 4. Verification
 *    Directly supplied fields are checked against their declared type when
 *    `checkTypes` is on. Remapped fields and defaults are not checked.
 *
 * 5. Instantiation
 *    The construction-time fields go to the composite's instantiator; the
 *    remaining fields are assigned on the instance; frozen composites are
 *    frozen last.
 *
 * Failure at any step aborts the whole call. Field errors raised below a
 * field collect that field's name on the way up, so the caller sees the
 * full dotted path (`order.lines.sku`).
 */
export type ConversionLifecycle = never;

/**
 * ARCHITECTURAL STRATEGY (4)
 * Union Resolution
 *
 * ---
 *
 * A union is resolved by trial: each member is built from the raw value in
 * declaration order and the result is tested against the member.
 *
 * - A build that throws eliminates the member, whatever it throws. A failed
 *   member is "not this shape", not an error of the conversion.
 * - Default mode is first-accepted-wins, so declaration order is the
 *   tie-break. Put narrower members first: `t.union(t.integer, t.number)`.
 * - `strictUnionsMatch` tries every member and fails on more than one
 *   acceptance. The failure does not depend on member order.
 * - Members whose accepted values overlap always collide under
 *   `strictUnionsMatch`: `t.integer` and `t.number` both accept `1`.
 * - `T | null` skips the trial entirely and builds `T`.
 */
export type UnionResolutionStrategy = never;

/**
 * ARCHITECTURAL STRATEGY (5)
 * Permissive Collection Fallback
 *
 * ---
 *
 * The collection builder only rebuilds input whose shape fits the target
 * (mapping for mapping, iterable for sequence/set/tuple). Anything else is
 * returned unchanged, and the decision is left to the field type check:
 *
 * - with `checkTypes`, a mismatched field raises `WrongTypeError` naming
 *   the field
 * - inside a union, the unchanged value fails the member's instance test
 *   and the member is eliminated
 * - with `checkTypes` off, the value is kept as supplied
 */
export type PermissiveCollectionFallback = never;

/**
 * ARCHITECTURAL STRATEGY (6)
 * Deferred Reference Resolution
 *
 * ---
 *
 * Self-referential and mutually recursive types can not be written as
 * plain descriptors, because a descriptor would have to contain itself.
 * `t.ref(name)` (looked up in `config.forwardReferences`) and
 * `t.lazy(() => type)` defer the link.
 *
 * - Reflection resolves the references of a composite's fields, through
 *   unions and collections but not into other composites (they are
 *   reflected when assembled).
 * - A reference reached again inside its own target stays a reference and
 *   is resolved by the value builder when the data actually recurses.
 * - A reference chain that never reaches a real type is a
 *   `ForwardReferenceError`, as is an undefined name.
 */
export type DeferredReferenceResolution = never;

/**
 * ARCHITECTURAL POLICY (7)
 * Caller-Owned Failures
 *
 * ---
 *
 * Errors raised by code the caller supplies, or by coercions the caller
 * asked for, propagate unchanged:
 *
 * - type hooks
 * - leaf constructors run by a cast (including enumeration membership)
 * - numeric parsing under `followTypeHints` (`NumericFormatError`)
 *
 * They are not wrapped in the `MappingError` taxonomy and carry no field
 * path. Inside a union trial they still eliminate the member (see
 * {@link UnionResolutionStrategy}).
 */
export type CallerOwnedFailurePolicy = never;

/**
 * ARCHITECTURAL POLICY (8)
 * Post-Construction Assignment
 *
 * ---
 *
 * Fields declared with `init: false` are assigned on the instance after
 * construction. An assignment the instance refuses (an instance frozen by
 * its own constructor, a getter-only property) must raise
 * `FrozenInstanceError`; the value must not be dropped silently.
 *
 * Composites declared `frozen` never take these fields from the input: an
 * input value for one raises `FrozenInstanceError` during assembly. Their
 * defaults are still assigned before the instance is frozen.
 */
export type PostConstructionAssignmentPolicy = never;

/**
 * ARCHITECTURAL POLICY (9)
 * Navigator Reads In Place
 *
 * ---
 *
 * The path navigator must not copy or modify its input. It walks the
 * nested mappings by reference and returns the value found, which the
 * value builder then rebuilds into fresh containers where needed.
 *
 * A missing segment is "absent" (fallback applies); a present segment that
 * is not a mapping while segments remain is a structural fault
 * (`PathLookupError`, fallback ignored).
 */
export type NavigatorReadsInPlace = never;

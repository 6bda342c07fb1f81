import type { TypeDescriptor } from './descriptors';

/**
 * Declaration of one composite field.
 *
 * Default rules (first match wins):
 * 1. `default` present (even when `undefined`) -> that value
 * 2. `defaultFactory` present -> a fresh value per conversion
 * 3. the type is optional -> `null`
 * 4. otherwise -> no default
 */
export type FieldSpec = {
  readonly type: TypeDescriptor;

  /**
   * `false` for fields that are not passed to the constructor and are
   * assigned on the instance afterwards.
   *
   * @default true
   */
  readonly init: boolean;

  readonly default?: { readonly value: unknown };
  readonly defaultFactory?: () => unknown;
};

export type FieldOptions = {
  default?: unknown;
  defaultFactory?: () => unknown;
  init?: boolean;
};

/**
 * Declares a composite field.
 *
 * @example
 * ```ts
 * field(t.string, { default: 'anonymous' })
 * field(t.array(t.integer), { defaultFactory: () => [] })
 * ```
 */
export function field(
  type: TypeDescriptor,
  options: FieldOptions = {}
): FieldSpec {
  return {
    type,
    init: options.init ?? true,
    ...('default' in options ? { default: { value: options.default } } : {}),
    ...(options.defaultFactory ? { defaultFactory: options.defaultFactory } : {})
  };
}

/**
 * Instantiator hook: receives the construction-time field map and returns
 * the instance.
 */
export type Construct<T> = (fields: Readonly<Record<string, unknown>>) => T;

export type CompositeOptions<T extends object> = {
  /**
   * Display name used in error messages.
   *
   * @default ctor.name
   */
  name?: string;

  /**
   * Field declarations in declaration order.
   */
  fields: Readonly<Record<string, FieldSpec>>;

  /**
   * Parent composite. Its fields come first; redeclared fields keep the
   * parent's position with the child's declaration.
   */
  extends?: CompositeType<object>;

  /**
   * Instances are frozen once every field has been assigned.
   *
   * @default false
   */
  frozen?: boolean;

  construct?: Construct<T>;
};

/**
 * A nested convertible record type: a class plus its field metadata.
 *
 * Instances are recognized by `instanceof` against the class, so a custom
 * `construct` must return instances of it.
 */
export class CompositeType<T extends object = object> {
  readonly kind = 'composite';
  readonly name: string;
  readonly fields: Readonly<Record<string, FieldSpec>>;
  readonly parent: CompositeType<object> | undefined;
  readonly frozen: boolean;

  constructor(
    readonly ctor: abstract new (...args: never[]) => T,
    private readonly constructInstance: Construct<T>,
    options: CompositeOptions<T>
  ) {
    this.name = options.name ?? ctor.name;
    this.parent = options.extends;
    this.fields = { ...options.extends?.fields, ...options.fields };
    this.frozen = options.frozen ?? false;
  }

  isInstance(value: unknown): value is T {
    return value instanceof this.ctor;
  }

  construct(fields: Readonly<Record<string, unknown>>): T {
    return this.constructInstance(fields);
  }
}

const compositesByClass = new WeakMap<Function, CompositeType<object>>();

/**
 * Attaches field metadata to a class.
 *
 * The default instantiator calls the zero-argument constructor and assigns
 * the construction-time fields onto the instance. Classes whose constructor
 * takes arguments must supply `construct`.
 *
 * @example
 * ```ts
 * class Point {
 *   x = 0;
 *   y = 0;
 * }
 *
 * const PointType = defineComposite(Point, {
 *   fields: { x: field(t.integer), y: field(t.integer, { default: 0 }) }
 * });
 * ```
 */
export function defineComposite<T extends object>(
  ctor: new () => T,
  options: CompositeOptions<T>
): CompositeType<T>;

export function defineComposite<T extends object>(
  ctor: abstract new (...args: never[]) => T,
  options: CompositeOptions<T> & { construct: Construct<T> }
): CompositeType<T>;

export function defineComposite<T extends object>(
  ctor: new () => T,
  options: CompositeOptions<T>
): CompositeType<T> {
  const construct =
    options.construct ??
    ((fields: Readonly<Record<string, unknown>>) =>
      Object.assign(new ctor(), fields));

  const composite = new CompositeType(ctor, construct, options);
  compositesByClass.set(ctor, composite);
  return composite;
}

/**
 * Finds the composite registered for a value's class, walking the
 * prototype chain so subclass instances resolve to the nearest registered
 * ancestor.
 */
export function compositeOfInstance(
  value: object
): CompositeType<object> | undefined {
  let proto: unknown = Object.getPrototypeOf(value);

  while (typeof proto === 'object' && proto !== null) {
    const ctor: unknown = Reflect.get(proto, 'constructor');
    if (typeof ctor === 'function') {
      const composite = compositesByClass.get(ctor);
      if (composite) return composite;
    }
    proto = Object.getPrototypeOf(proto);
  }

  return undefined;
}

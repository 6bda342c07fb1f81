import { t } from '../../types/builders';
import { defineComposite, field } from '../../types/composite';
import { isString } from '../../utils/type-guards';

/**
 * Shared declarations for engine suites.
 */

export class Point {
  declare x: number;
  declare y: number;
}

export const PointType = defineComposite(Point, {
  fields: {
    x: field(t.integer),
    y: field(t.integer, { default: 0 })
  }
});

export class Label {
  declare text: string;
}

export const LabelType = defineComposite(Label, {
  fields: { text: field(t.string) }
});

/**
 * Upper-case brand names; a child of `string`.
 */
export const CarCompany = t.string.extend('CarCompany', {
  test: (value: unknown): value is string =>
    isString(value) && value === value.toUpperCase(),
  construct: (value: unknown) => String(value).toUpperCase()
});

export const Color = t.enumeration('Color', ['red', 'green']);

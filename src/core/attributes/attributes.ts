/**
 * Scheduler policy attributes
 *
 * The closed set of association limit fields this tool manages, and the
 * case rule applied to each value before it is stored or compared.
 *
 * @module
 */

import { z } from "zod";

/**
 * Managed attributes, in the order they are rendered on a command line.
 */
export const AttributeSchema = z.enum([
  "fairshare",
  "GrpTRES",
  "GrpTRESMins",
  "MaxTRES",
  "MaxTRESPerNode",
  "MaxTRESMins",
  "GrpTRESRunMins",
  "QOS",
  "DefQOS",
]);

export type Attribute = z.infer<typeof AttributeSchema>;

export const ATTRIBUTES: readonly Attribute[] = AttributeSchema.options;

/**
 * tres: TRES specifications such as `cpu=1500,mem=4G` (lower-cased)
 * qos: QOS names (upper-cased)
 * scalar: fairshare, a number or the keyword `parent` (lower-cased)
 */
export type AttributeClass = "tres" | "qos" | "scalar";

const ATTRIBUTE_CLASS: Record<Attribute, AttributeClass> = {
  fairshare: "scalar",
  GrpTRES: "tres",
  GrpTRESMins: "tres",
  MaxTRES: "tres",
  MaxTRESPerNode: "tres",
  MaxTRESMins: "tres",
  GrpTRESRunMins: "tres",
  QOS: "qos",
  DefQOS: "qos",
};

const BY_LOWER_NAME: ReadonlyMap<string, Attribute> = new Map(
  ATTRIBUTES.map((attribute) => [attribute.toLowerCase(), attribute])
);

export function attributeClass(attribute: Attribute): AttributeClass {
  return ATTRIBUTE_CLASS[attribute];
}

/**
 * Maps any casing of an attribute name to its canonical spelling.
 * Returns undefined for names outside the managed set.
 */
export function canonicalAttribute(name: string): Attribute | undefined {
  return BY_LOWER_NAME.get(name.trim().toLowerCase());
}

/**
 * Applies the attribute's case rule. Values are otherwise opaque.
 */
export function normalizeValue(attribute: Attribute, value: string): string {
  const trimmed = value.trim();
  return ATTRIBUTE_CLASS[attribute] === "qos" ? trimmed.toUpperCase() : trimmed.toLowerCase();
}

export function valuesEqual(attribute: Attribute, a: string, b: string): boolean {
  return normalizeValue(attribute, a) === normalizeValue(attribute, b);
}

/**
 * Sort comparator for canonical (enumeration) order
 */
export function compareAttributes(a: Attribute, b: Attribute): number {
  return ATTRIBUTES.indexOf(a) - ATTRIBUTES.indexOf(b);
}

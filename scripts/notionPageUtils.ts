/**
 * Shared utilities for reading raw Notion pages and flattening their
 * properties into printable values
 */

import { z } from "zod";
import type { PropertyValue } from "./types";

/** Value every unrecognized or malformed property collapses to */
export const UNKNOWN_PROPERTY_VALUE = "";

export const richTextSchema = z.array(
  z.object({ plain_text: z.string().optional() })
);

export type RichText = z.infer<typeof richTextSchema>;

export function joinPlainText(richText: RichText): string {
  return richText.map((item) => item.plain_text ?? "").join("");
}

const namedOptionSchema = z.object({ name: z.string() });

const dateValueSchema = z.object({
  start: z.string(),
  end: z.string().nullish(),
});

const formulaSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("string"), string: z.string().nullable() }),
  z.object({ type: z.literal("number"), number: z.number().nullable() }),
  z.object({ type: z.literal("boolean"), boolean: z.boolean().nullable() }),
  z.object({ type: z.literal("date"), date: dateValueSchema.nullable() }),
]);

const propertySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("title"), title: richTextSchema }),
  z.object({ type: z.literal("rich_text"), rich_text: richTextSchema }),
  z.object({ type: z.literal("select"), select: namedOptionSchema.nullable() }),
  z.object({ type: z.literal("status"), status: namedOptionSchema.nullable() }),
  z.object({
    type: z.literal("multi_select"),
    multi_select: z.array(namedOptionSchema),
  }),
  z.object({ type: z.literal("date"), date: dateValueSchema.nullable() }),
  z.object({ type: z.literal("checkbox"), checkbox: z.boolean() }),
  z.object({ type: z.literal("number"), number: z.number().nullable() }),
  z.object({ type: z.literal("url"), url: z.string().nullable() }),
  z.object({ type: z.literal("email"), email: z.string().nullable() }),
  z.object({
    type: z.literal("phone_number"),
    phone_number: z.string().nullable(),
  }),
  z.object({
    type: z.literal("relation"),
    relation: z.array(z.object({ id: z.string() })),
  }),
  z.object({
    type: z.literal("people"),
    people: z.array(z.object({ id: z.string(), name: z.string().nullish() })),
  }),
  z.object({ type: z.literal("created_time"), created_time: z.string() }),
  z.object({
    type: z.literal("last_edited_time"),
    last_edited_time: z.string(),
  }),
  z.object({
    type: z.literal("unique_id"),
    unique_id: z.object({
      prefix: z.string().nullable(),
      number: z.number().nullable(),
    }),
  }),
  z.object({ type: z.literal("formula"), formula: formulaSchema }),
  z.object({
    type: z.literal("files"),
    files: z.array(z.object({ name: z.string() })),
  }),
]);

/**
 * Raw page object as returned by a database query. Partial pages and data
 * source objects do not match.
 */
export const rawPageSchema = z.object({
  object: z.literal("page"),
  id: z.string(),
  url: z.string().default(""),
  created_time: z.string().default(""),
  last_edited_time: z.string().default(""),
  archived: z.boolean().optional(),
  in_trash: z.boolean().optional(),
  properties: z.record(z.string(), z.unknown()),
});

export type RawPage = z.infer<typeof rawPageSchema>;

export function parseRawPage(value: unknown): RawPage | null {
  const result = rawPageSchema.safeParse(value);
  return result.success ? result.data : null;
}

function formatDate(date: z.infer<typeof dateValueSchema>): string {
  return date.end ? `${date.start} → ${date.end}` : date.start;
}

function flattenFormula(formula: z.infer<typeof formulaSchema>): PropertyValue {
  switch (formula.type) {
    case "string":
      return formula.string ?? "";
    case "number":
      return formula.number;
    case "boolean":
      return formula.boolean;
    case "date":
      return formula.date ? formatDate(formula.date) : "";
  }
}

/**
 * Coerce one Notion property to a display value.
 * Never throws: unknown types and malformed payloads become "".
 */
export function flattenProperty(property: unknown): PropertyValue {
  const result = propertySchema.safeParse(property);
  if (!result.success) return UNKNOWN_PROPERTY_VALUE;

  const prop = result.data;
  switch (prop.type) {
    case "title":
      return joinPlainText(prop.title);
    case "rich_text":
      return joinPlainText(prop.rich_text);
    case "select":
      return prop.select?.name ?? "";
    case "status":
      return prop.status?.name ?? "";
    case "multi_select":
      return prop.multi_select.map((option) => option.name);
    case "date":
      return prop.date ? formatDate(prop.date) : "";
    case "checkbox":
      return prop.checkbox;
    case "number":
      return prop.number;
    case "url":
      return prop.url ?? "";
    case "email":
      return prop.email ?? "";
    case "phone_number":
      return prop.phone_number ?? "";
    case "relation":
      return prop.relation.map((related) => related.id);
    case "people":
      return prop.people.map((person) => person.name ?? person.id);
    case "created_time":
      return prop.created_time;
    case "last_edited_time":
      return prop.last_edited_time;
    case "unique_id": {
      const { prefix, number } = prop.unique_id;
      if (number === null) return "";
      return prefix ? `${prefix}-${number}` : String(number);
    }
    case "formula":
      return flattenFormula(prop.formula);
    case "files":
      return prop.files.map((file) => file.name);
  }
}

export function flattenProperties(
  properties: Record<string, unknown>
): Record<string, PropertyValue> {
  const flattened: Record<string, PropertyValue> = {};
  for (const [name, property] of Object.entries(properties)) {
    flattened[name] = flattenProperty(property);
  }
  return flattened;
}

/**
 * Text form of a flattened value, used for status and project tags
 */
export function propertyValueToText(value: PropertyValue | undefined): string {
  if (value === undefined || value === null) return "";
  if (Array.isArray(value)) return value.join(", ");
  return String(value).trim();
}

/**
 * Extract the page title from the named property, falling back to whichever
 * property has the title type
 * @returns The title, or "" when the page has none
 */
export function getTitleFromProperties(
  properties: Record<string, unknown>,
  titleProperty: string
): string {
  const named = propertySchema.safeParse(properties[titleProperty]);
  if (named.success && named.data.type === "title") {
    return joinPlainText(named.data.title).trim();
  }

  for (const property of Object.values(properties)) {
    const parsed = propertySchema.safeParse(property);
    if (parsed.success && parsed.data.type === "title") {
      return joinPlainText(parsed.data.title).trim();
    }
  }
  return "";
}

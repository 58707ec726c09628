/**
 * Typed builders for the leaf kinds understood by the graph UI. The host core
 * never branches on these kinds (except `dropdown` in the input mapper); the
 * builders only spare definition authors from writing the records by hand.
 *
 * Every builder returns a plain record with `type`, `label` and `style`, plus
 * `placeholder` when one is given and the kind-specific fields.
 */
import type { LayoutElement } from "./types.js";

export const INPUT_KINDS = ["text", "textarea", "dropdown", "number", "decimal", "upload"] as const;
export const DISPLAY_KINDS = [
  "title",
  "section",
  "copy-text",
  "copy-code",
  "json",
  "image",
  "pdf",
  "video",
  "list",
  "table",
  "empty",
] as const;

export type InputKind = (typeof INPUT_KINDS)[number];
export type DisplayKind = (typeof DISPLAY_KINDS)[number];
export type ElementKind = InputKind | DisplayKind;

/** Kind whose input collapses to the selected option. */
export const SELECTABLE_OPTION_KIND: ElementKind = "dropdown";

export type ElementStyle = Record<string, unknown>;

/** Options shared by every builder. */
export interface ElementOptions {
  readonly label?: string;
  readonly style?: ElementStyle;
  readonly placeholder?: string;
}

export interface ValueElementOptions<TValue> extends ElementOptions {
  readonly value?: TValue;
  readonly icon?: string;
}

export interface DropdownOption {
  readonly label: string;
  readonly tooltip?: string;
  readonly value?: string;
}

export interface DropdownOptions extends ElementOptions {
  readonly options?: readonly DropdownOption[];
  readonly value?: DropdownOption;
}

export interface UploadOptions extends ValueElementOptions<string> {
  readonly supportedFiles?: readonly string[];
}

export type ElementOf<K extends ElementKind> = LayoutElement & { readonly type: K; readonly style: ElementStyle };

function base<K extends ElementKind>(
  type: K,
  options: ElementOptions,
  fields: Record<string, unknown> = {},
): ElementOf<K> {
  return {
    type,
    label: options.label ?? "",
    style: { ...(options.style ?? {}) },
    ...(options.placeholder ? { placeholder: options.placeholder } : {}),
    ...fields,
  };
}

/** Copies only the fields that were provided. */
function defined(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

export function textInput(options: ValueElementOptions<string> = {}): ElementOf<"text"> {
  return base("text", options, defined({ value: options.value, icon: options.icon ?? "IconAlphabetLatin" }));
}

export function textAreaInput(options: ValueElementOptions<string> = {}): ElementOf<"textarea"> {
  return base("textarea", options, defined({ value: options.value, icon: options.icon ?? "IconAlphabetLatin" }));
}

export function dropdownInput(options: DropdownOptions = {}): ElementOf<"dropdown"> {
  return base(
    "dropdown",
    options,
    defined({ options: (options.options ?? []).map((option) => ({ ...option })), value: options.value }),
  );
}

export function numberInput(options: ValueElementOptions<number> = {}): ElementOf<"number"> {
  return base("number", options, defined({ value: options.value, icon: options.icon ?? "123" }));
}

export function decimalInput(options: ValueElementOptions<number> = {}): ElementOf<"decimal"> {
  return base("decimal", options, defined({ value: options.value, icon: options.icon ?? "123" }));
}

export function uploadFileInput(options: UploadOptions = {}): ElementOf<"upload"> {
  return base(
    "upload",
    options,
    defined({
      value: options.value,
      icon: options.icon ?? "IconFileUpload",
      supported_files: [...(options.supportedFiles ?? [])],
    }),
  );
}

export function title(options: ValueElementOptions<string> = {}): ElementOf<"title"> {
  return base("title", options, defined({ value: options.value }));
}

/** Paragraph of text, optionally with an icon. */
export function section(options: ValueElementOptions<string> = {}): ElementOf<"section"> {
  return base("section", options, defined({ value: options.value, icon: options.icon }));
}

export function copyText(options: ValueElementOptions<string> = {}): ElementOf<"copy-text"> {
  return base("copy-text", options, defined({ value: options.value, icon: options.icon }));
}

export function copyCode(options: ValueElementOptions<string> = {}): ElementOf<"copy-code"> {
  return base("copy-code", options, defined({ value: options.value }));
}

/** Builder for the display kinds that carry no field of their own. */
export function display<K extends "json" | "image" | "pdf" | "video" | "list" | "table" | "empty">(
  kind: K,
  options: ElementOptions = {},
): ElementOf<K> {
  return base(kind, options);
}

/** Spacer keeping a row aligned. */
export function empty(): ElementOf<"empty"> {
  return display("empty");
}

/** Groups leaves rendered side by side. */
export function row(...elements: LayoutElement[]): LayoutElement[] {
  return elements;
}

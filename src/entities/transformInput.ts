import { normalizeLabel } from "../utils/labels.js";
import { isPlainRecord } from "../utils/object.js";
import type { TransformInputRecord } from "./types.js";

/**
 * Input handed to a transform handler. Wraps the open record produced by the
 * input mapper with accessors that normalise the requested label, so
 * `input.getString("URL")` and `input.getString("url")` read the same key.
 * Unknown keys stay reachable through {@link values}.
 */
export class TransformInput {
  readonly values: Readonly<TransformInputRecord>;

  constructor(values: TransformInputRecord) {
    this.values = Object.freeze({ ...values });
  }

  has(label: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, normalizeLabel(label));
  }

  get(label: string): unknown {
    const key = normalizeLabel(label);
    return Object.prototype.hasOwnProperty.call(this.values, key) ? this.values[key] : undefined;
  }

  getString(label: string): string | undefined {
    const value = this.scalar(label);
    return typeof value === "string" ? value : undefined;
  }

  getNumber(label: string): number | undefined {
    const value = this.scalar(label);
    return typeof value === "number" && Number.isFinite(value) ? value : undefined;
  }

  getBoolean(label: string): boolean | undefined {
    const value = this.scalar(label);
    return typeof value === "boolean" ? value : undefined;
  }

  /** Nested field map of a multi-field leaf, `undefined` for scalars. */
  getFields(label: string): Readonly<Record<string, unknown>> | undefined {
    const value = this.get(label);
    return isPlainRecord(value) ? value : undefined;
  }

  keys(): string[] {
    return Object.keys(this.values);
  }

  toJSON(): TransformInputRecord {
    return { ...this.values };
  }

  /**
   * Leaves that keep several fields (a number input keeps `{ value: 3 }`)
   * expose their `value` field to the scalar accessors.
   */
  private scalar(label: string): unknown {
    const value = this.get(label);
    if (isPlainRecord(value) && "value" in value) {
      return value.value;
    }
    return value;
  }
}

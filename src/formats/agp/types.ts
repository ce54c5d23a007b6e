/**
 * AGP (A Golden Path) assembly-map type definitions
 *
 * An AGP file lists, for each chromosome (the "object"), the ordered parts it
 * is built from: sequence components such as scaffolds, or gaps.
 *
 * @module agp/types
 */

import type { ParserOptions } from "../../types";

/**
 * Component types that describe a gap rather than a sequence
 */
export type AgpGapType = "N" | "U";

/**
 * Fields shared by component and gap rows
 */
interface AgpRowBase {
  /** Object (chromosome) identifier */
  readonly object: string;
  /** Start of this part on the object, 1-based inclusive */
  readonly objectStart: number;
  /** End of this part on the object, 1-based inclusive */
  readonly objectEnd: number;
  /** Part number within the object */
  readonly partNumber: number;
  /** Source line number */
  readonly lineNumber: number;
}

/**
 * A row placing a sequence component (e.g. a scaffold) on an object
 */
export interface AgpComponentRecord extends AgpRowBase {
  readonly kind: "component";
  /** Component type (W, A, D, F, G, O, P, ...) */
  readonly componentType: string;
  /** Component (scaffold) identifier */
  readonly componentId: string;
  /** Component-local start, kept as written */
  readonly componentStart: string;
  /** Component-local end, kept as written */
  readonly componentEnd: string;
  /** Orientation symbol as written: "+", "-", "?", "0" or "na" */
  readonly orientation: string;
}

/**
 * A gap row (component type N or U)
 */
export interface AgpGapRecord extends AgpRowBase {
  readonly kind: "gap";
  readonly componentType: AgpGapType;
  readonly gapLength?: string;
  readonly gapType?: string;
  readonly linkage?: string;
  readonly linkageEvidence?: string;
}

/**
 * A parsed AGP row
 */
export type AgpRecord = AgpComponentRecord | AgpGapRecord;

/**
 * AGP parser configuration options
 */
export interface AgpParserOptions extends ParserOptions {}

/**
 * Column requirements for AGP rows
 */
export const AGP_FIELD_COUNTS = {
  /** Columns needed to tell a gap row from a component row */
  CLASSIFY: 5,
  /** Columns a component row must carry */
  COMPONENT: 9,
} as const;

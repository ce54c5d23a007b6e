/**
 * AGP assembly-map format
 *
 * @example
 * ```typescript
 * import { AgpParser } from "@/formats/agp";
 *
 * for await (const record of new AgpParser().parseString(agpText)) {
 *   console.log(record.object, record.objectStart, record.objectEnd);
 * }
 * ```
 *
 * @module agp
 */

export { AgpParser, isGapType, parseAgpLine } from "./parser";
export type {
  AgpComponentRecord,
  AgpGapRecord,
  AgpGapType,
  AgpParserOptions,
  AgpRecord,
} from "./types";
export { AGP_FIELD_COUNTS } from "./types";

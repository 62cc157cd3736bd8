/**
 * packages/core/src/icons/index.ts — Icon system exports.
 */

export {
  createIconRegistry,
  isIconKey,
  parseIconLabel,
  type IconRegistry,
  type IconVariant,
  type IconKey,
  type IconLabel,
} from "./registry.js";

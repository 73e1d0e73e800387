/**
 * Inventory input: the per-file table produced by the upstream inventory step.
 */

export {
  INVENTORY_FILE_NAME,
  REQUIRED_INVENTORY_COLUMNS,
  InventoryCsvRowSchema,
  type InventoryCsvRow,
} from "./schema.js";

export {
  loadInventory,
  parseInventoryRecords,
  resolveAudioPath,
  transcriptLength,
  type LoadedInventory,
} from "./loader.js";

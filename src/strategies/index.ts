export {
  StrategyStore,
  SavedStrategySchema,
  StrategyKindSchema,
  OptionLegSchema,
} from "./strategy-store.js";
export type { SavedStrategy, NewStrategy, StrategyStoreOptions } from "./strategy-store.js";

import { getConfig } from "../config.js";
import { StrategyStore } from "./strategy-store.js";

let storePromise: Promise<StrategyStore> | null = null;

export function getStrategyStore(): Promise<StrategyStore> {
  if (!storePromise) {
    storePromise = StrategyStore.create(getConfig().dataDir);
  }
  return storePromise;
}

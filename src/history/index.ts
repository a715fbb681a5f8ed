export {
  loadHistory,
  persistHistory,
  recordDelivery,
  hasDelivered,
  ensureFeedRecord,
} from "./store";
export type { HistoryStore } from "./store";

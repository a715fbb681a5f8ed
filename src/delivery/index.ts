export { formatMessage } from "./formatter";
export { createTelegramClient } from "./telegram";
export type { DeliveryClient, Destination } from "./telegram";
export { deliverMessage, sendStartupAnnouncement } from "./deliver";

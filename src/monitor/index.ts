export { runPollCycle, destinationFor, sleep } from "./cycle";

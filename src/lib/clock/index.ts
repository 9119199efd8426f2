export { createSystemClock, sleep, systemClock, type Clock } from "./clock";

export { Duration } from "./duration";
export { Power } from "./power";
export { Energy } from "./energy";
export { EnergyPrice } from "./price";
export { Percentage } from "./percentage";
export { TimeSlot } from "./time-slot";
export { describeError, ServiceValidationError, UpdateFailedError } from "./errors";
export * from "./areas";
export * from "./nordpool-payload";
export * from "./day-prices";
export * from "./pricing";
export * from "./cet-calendar";

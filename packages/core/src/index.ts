export * from "./models/common";
export * from "./models/departures";
export * from "./time";
export * from "./proximity";
export * from "./mergeDepartures";
export * from "./filterRank";
export * from "./format";
export * from "./grid";

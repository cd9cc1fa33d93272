export * from "./dto";
export * from "./metric-types";
export * from "./dates";
export * from "./health";

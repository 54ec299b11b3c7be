export * from "./health-types";
export * from "./dto";

export * from "./models/common";
export * from "./models/transit";
export * from "./models/service";
export * from "./api/types";
export * from "./api/endpoints";

export * from "./models/common";
export * from "./models/routeConditions";
export * from "./api/types";
export * from "./api/endpoints";

export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config/topology.js";
export * from "./graph/types.js";
export * from "./graph/options.js";
export * from "./graph/model.js";
export * from "./graph/diameter.js";
export * from "./graph/product.js";
export * from "./topology/shape.js";
export * from "./topology/dimensions.js";
export * from "./topology/basic.js";
export * from "./topology/composite.js";

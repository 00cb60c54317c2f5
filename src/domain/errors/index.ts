export { InvalidArgumentError } from "./InvalidArgumentError.js";
export { UnsupportedOperationError } from "./UnsupportedOperationError.js";

/**
 * Pipeline modules export
 */

export { resolve } from "./resolver";
export { mirror } from "./mirror";
export { scan } from "./scanner";
export { select } from "./selector";
export { stats } from "./stats";

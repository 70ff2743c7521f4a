/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath } from "../../utils/load-config";

export function configCommand(): void {
  console.log("User configuration file location:");
  console.log(getUserConfigPath());
  console.log("\nCreate this file to override the defaults in src/config/default.json.");
}

/**
 * Config command - Show configuration file location and built-in defaults
 */

import { getUserConfigPath, loadDefaultConfig } from "../../utils/load-config";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to customize conversion settings.");
  console.log("Any subset of the defaults below may be overridden:");
  console.log(JSON.stringify(loadDefaultConfig(), null, 2));
}

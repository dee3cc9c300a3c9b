// provider/bootstrap/index.ts - Default user-data generator

import { RunnerProviderError } from "@ec2-runner/contracts";
import type { UserDataGenerator } from "../types";
import { assembleCloudInit } from "./cloud-init";
import { renderWindowsInstallScript } from "./install-script";

/**
 * Linux runners get a #cloud-config document; Windows runners get a
 * PowerShell script that EC2Launch runs on first boot.
 */
export const generateUserData: UserDataGenerator = (bootstrap, tools, runnerName) => {
  switch (bootstrap.os_type) {
    case "linux":
      return assembleCloudInit(bootstrap, tools, runnerName);
    case "windows":
      return renderWindowsInstallScript(bootstrap, tools, runnerName);
    default:
      throw new RunnerProviderError(
        "UNSUPPORTED_OS_TYPE",
        `unsupported OS type for cloud config: ${bootstrap.os_type}`,
        { details: { osType: bootstrap.os_type } },
      );
  }
};

export { assembleCloudInit } from "./cloud-init";
export { renderLinuxInstallScript, renderWindowsInstallScript, shellQuote, powershellQuote } from "./install-script";

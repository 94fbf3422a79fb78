export {
  install,
  installGlobal,
  type InstallGlobalOpts,
  type InstallGlobalResult,
  type InstallOpts,
  type InstallResult,
} from "./installer.js";

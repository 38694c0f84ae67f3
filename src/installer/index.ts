export {
  Installer,
  type AssistantOutcome,
  type OutcomeStatus,
  type InstallReport,
  type InstallRequest,
  type UninstallRequest,
  type UpdateRequest,
  type InstallerDeps,
} from './installer.js';

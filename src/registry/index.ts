export { InstallationRegistry, sameInstallation, type InstallationFilter } from './installation-registry.js';
export { RegistryDocumentSchema, InstallationSchema } from './schema.js';

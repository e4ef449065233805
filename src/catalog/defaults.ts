/**
 * Built-in trusted domains: Microsoft Fabric and Azure service endpoints
 * that Spark sessions talk to as part of normal operation.
 */

const FABRIC_DOMAINS = [
  'pbidedicated.windows.net',
  'analysis.windows.net',
  'api.fabric.microsoft.com',
  'onelake.dfs.fabric.microsoft.com',
  'sparkui.fabric.microsoft.com',
  'storage.azure.com',
  'exec.eastus.notebook.windows.net',
  'exec.westus.notebook.windows.net',
  'exec.northeurope.notebook.windows.net',
  'exec.westeurope.notebook.windows.net',
  'tokenservice1.eastus.trident.azuresynapse.net',
  'tokenservice1.westus.trident.azuresynapse.net',
  'tokenservice1.northeurope.trident.azuresynapse.net',
  'tokenservice1.westeurope.trident.azuresynapse.net',
];

const LOCAL_HOSTS = ['operation-service', 'vm-', 'localhost', '127.0.0.1', '::1'];

/** Each service domain is trusted along with its subdomains. */
export const DEFAULT_TRUSTED_DOMAINS: readonly string[] = Object.freeze([
  ...FABRIC_DOMAINS.flatMap(d => [d, `*.${d}`]),
  ...LOCAL_HOSTS,
]);

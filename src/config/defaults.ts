/**
 * Centralized Defaults
 *
 * Fixed names, ports and retry budgets of the demo environment. Everything the
 * operator may override lives in app-config.ts instead.
 */

/**
 * Default values for optional configuration keys
 */
export const CONFIG_DEFAULTS = {
  clusterName: 'kagent-demo',
  caBundlePath: '~/.certs/ca-bundle.crt',
  argocdNamespace: 'argocd',
  kagentNamespace: 'kagent',
  containerRuntime: 'podman',
  stateDir: '/tmp',
  logLevel: 'warn',
  envFile: '.env',
  manifestDir: 'argocd',
} as const;

/**
 * Control plane installation and access
 */
export const CONTROL_PLANE = {
  installManifestUrl:
    'https://raw.githubusercontent.com/argoproj/argo-cd/stable/manifests/install.yaml',
  serverDeployment: 'argocd-server',
  serverService: 'argocd-server',
  adminSecret: 'argocd-initial-admin-secret',
  adminUser: 'admin',
  localPort: 8080,
  remotePort: 443,
  projectName: 'kagent',
} as const;

/**
 * Application descriptors, applied in this order
 */
export const DESCRIPTORS = {
  project: 'kagent-project.yaml',
  applications: ['kagent-simple-app.yaml', 'mcp-sqlite-vec-app.yaml'],
} as const;

/**
 * Application objects the control plane reconciles, settled in this order
 */
export const APPLICATIONS = ['kagent', 'mcp-sqlite-vec'] as const;

/**
 * Credential objects created in the workload namespace
 */
export const SECRETS = {
  platform: 'kagent-openai',
  tools: 'mcp-secrets',
  credentialKey: 'OPENAI_API_KEY',
} as const;

/**
 * Workload UI exposed on the operator's machine
 */
export const KAGENT_UI = {
  service: 'kagent-ui',
  localPort: 8090,
  remotePort: 80,
  logFile: 'kagent-ui-pf.log',
} as const;

/**
 * CA bundle propagation to cluster nodes
 */
export const CERTIFICATES = {
  nodeBundlePath: '/usr/local/share/ca-certificates/ca-bundle.crt',
  probeImage: 'curlimages/curl',
  probePod: 'cert-test',
  probeUrl: 'https://external-secrets.io/index.yaml',
} as const;

/**
 * Retry budgets and timeouts, in milliseconds unless named otherwise
 */
export const TIMINGS = {
  clusterRecovery: { intervalMs: 2000, maxAttempts: 30 },
  runtimeReloadGraceMs: 5000,
  installTimeoutSeconds: 600,
  installPollIntervalMs: 5000,
  serverReadyTimeoutSeconds: 120,
  projectIndexPauseMs: 2000,
  applicationVisible: { intervalMs: 5000, maxAttempts: 60, reportEvery: 6 },
  operationSettle: { intervalMs: 10000, maxAttempts: 30 },
  sync: { intervalMs: 10000, maxAttempts: 3, timeoutSeconds: 300 },
  betweenApplicationsMs: 5000,
  uiReady: { intervalMs: 5000, maxAttempts: 120, reportEvery: 12 },
  portForwardStartGraceMs: 3000,
  portForwardRetryPauseMs: 2000,
  portForwardSweepPauseMs: 2000,
  portForwardProbe: { intervalMs: 2000, maxAttempts: 10, timeoutMs: 5000 },
  namespaceGraceful: { intervalMs: 2000, maxAttempts: 16 },
  namespaceGone: { intervalMs: 2000, maxAttempts: 30 },
  applicationDeletePauseMs: 3000,
  probePodTimeoutMs: 120000,
} as const;

/**
 * Candidate paths tried by the tunnel readiness probe
 */
export const PROBE_PATHS = ['/health', '/api/health', '/', ''] as const;

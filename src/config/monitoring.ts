/**
 * Monitoring defaults. Anything here can be overridden from config/monitor.json.
 */
export const monitoringDefaults = {
  // Models the fabric keeps deployed; always part of the catalog
  baselineModels: [
    'openai-community/gpt2',
    'EleutherAI/gpt-j-6b',
    'meta-llama/Llama-2-7b-hf',
    'meta-llama/Llama-3.1-8B',
    'allenai/Olmo-3-1025-7B',
    'meta-llama/Llama-3.1-70B',
    'meta-llama/Llama-3.1-70B-Instruct',
    'meta-llama/Llama-3.3-70B-Instruct',
    'meta-llama/Llama-3.1-405B-Instruct',
  ],

  scenarios: [
    { name: 'basic_trace', description: 'Trace a prompt and save one hidden state', timeoutMs: 90 * 1000, slowThresholdMs: 30 * 1000 },
    { name: 'generation', description: 'Generate a short continuation', timeoutMs: 90 * 1000, slowThresholdMs: 45 * 1000 },
    { name: 'hidden_states', description: 'Extract hidden states from every layer', timeoutMs: 120 * 1000, slowThresholdMs: 60 * 1000 },
  ],

  runner: {
    command: 'python3',
    args: ['scenarios/{scenario}.py', '--model', '{model}'],
    partialMarker: 'PARTIAL:',
  },

  discovery: {
    statusUrl: 'https://api.ndif.us/status',
    timeoutMs: 30 * 1000,
    maxExtraPerArchitecture: 2,
    includeExtraHot: true,
  },

  dashboard: {
    days: 365,
    timezone: 'UTC',
    failureLimit: 10,
    failureWindowDays: 7,
    repoUrl: '',
    branch: 'main',
    templatePath: 'templates/dashboard.html',
  },

  storage: {
    resultsDir: 'results',
    // Per-model status files: short critical sections
    lock: { staleMs: 60 * 1000, retryIntervalMs: 200, maxRetries: 50 },
    // Cycle pointer: held for a whole model run, so stale only after the longest run
    cycleLock: { staleMs: 30 * 60 * 1000, retryIntervalMs: 1000, maxRetries: 5 },
  },

  allOkPolicy: 'strict' as const,
  saveRunLog: true,
};

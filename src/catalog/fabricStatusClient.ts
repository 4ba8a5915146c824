import axios, { AxiosInstance } from 'axios';
import { isRecord } from '../utils/guards';
import { logger } from '../utils/logger';
import { detectArchitecture, ModelArchitecture } from './architecture';

export type DeploymentLevel = 'HOT' | 'WARM' | 'COLD';

export interface FabricModel {
  id: string;
  deploymentLevel: DeploymentLevel;
  applicationState: string;
  nParams: number | null;
  dedicated: boolean;
  architecture: ModelArchitecture;
}

export interface HotModelSource {
  listModels(options?: { hotOnly?: boolean }): Promise<FabricModel[]>;
}

export function isAvailable(model: FabricModel): boolean {
  return model.deploymentLevel === 'HOT' && model.applicationState === 'RUNNING';
}

function parseDeploymentLevel(value: unknown): DeploymentLevel | undefined {
  if (value === undefined) return 'COLD';
  if (value === 'HOT' || value === 'WARM' || value === 'COLD') return value;
  return undefined;
}

/**
 * Turns one `deployments` entry of the status payload into a model. Entries
 * without a usable `org/name` id or with an unknown level are dropped.
 */
export function parseDeployment(key: string, value: unknown): FabricModel | undefined {
  if (!isRecord(value)) return undefined;

  const id = typeof value.repo_id === 'string' && value.repo_id ? value.repo_id : key;
  if (!/^[^/\s]+\/[^/\s]+$/.test(id)) return undefined;

  const deploymentLevel = parseDeploymentLevel(value.deployment_level);
  if (!deploymentLevel) return undefined;

  const config = typeof value.config === 'string' ? value.config : undefined;

  return {
    id,
    deploymentLevel,
    applicationState: typeof value.application_state === 'string' ? value.application_state : 'UNKNOWN',
    nParams: typeof value.n_params === 'number' ? value.n_params : null,
    dedicated: value.dedicated === true,
    architecture: detectArchitecture(id, config),
  };
}

export function parseStatusPayload(payload: unknown): FabricModel[] {
  if (!isRecord(payload) || !isRecord(payload.deployments)) {
    throw new Error('Status payload has no deployments object');
  }

  const models: FabricModel[] = [];
  for (const [key, value] of Object.entries(payload.deployments)) {
    const model = parseDeployment(key, value);
    if (model) {
      models.push(model);
    } else {
      logger.debug(`Skipping malformed deployment entry: ${key}`);
    }
  }
  return models;
}

/**
 * Reads the fabric's public status endpoint.
 */
export class FabricStatusClient implements HotModelSource {
  private http: AxiosInstance;

  constructor(private statusUrl: string, timeoutMs: number, http?: AxiosInstance) {
    this.http = http || axios.create({ timeout: timeoutMs });
  }

  async fetchStatus(): Promise<unknown> {
    const response = await this.http.get<unknown>(this.statusUrl);
    return response.data;
  }

  async listModels(options: { hotOnly?: boolean } = {}): Promise<FabricModel[]> {
    const { hotOnly = true } = options;
    const models = parseStatusPayload(await this.fetchStatus());
    return hotOnly ? models.filter(m => m.deploymentLevel === 'HOT') : models;
  }
}

import { Injectable } from '@nestjs/common';
import { MODEL_VERSION } from './scoring/risk-model';

export const SERVICE_NAME = 'riskline';
export const SERVICE_VERSION = '1.0.0';

export interface ServiceInfo {
  name: string;
  version: string;
  modelVersion: string;
}

@Injectable()
export class AppService {
  getData(): ServiceInfo {
    return { name: SERVICE_NAME, version: SERVICE_VERSION, modelVersion: MODEL_VERSION };
  }
}

import { Injectable } from '@nestjs/common';
import {
  AI_PROVIDER,
  SERVICE_NAME,
} from './pipeline/config/pipeline.constants';

@Injectable()
export class AppService {
  getInfo(): { service: string; version: string; aiProvider: string } {
    return {
      service: SERVICE_NAME,
      version: '0.1.0',
      aiProvider: AI_PROVIDER,
    };
  }
}

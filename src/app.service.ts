import { Injectable } from '@nestjs/common';

@Injectable()
export class AppService {
  getInfo(): { service: string; version: string } {
    return {
      service: 'category-analyst',
      version: '1.0.0',
    };
  }
}

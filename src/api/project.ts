/**
 * Project API
 */

import type { CommerceClient } from './client.js';
import type { Project } from './types.js';

export class ProjectAPI {
  constructor(private readonly client: CommerceClient) {}

  /**
   * Fetch the project settings
   */
  async get(accessToken: string): Promise<Project> {
    return this.client.request<Project>('', accessToken);
  }
}

import { Module } from '@nestjs/common';

import { GITHUB_CLIENT } from './github-client.token.js';
import { OctokitClient } from './octokit-client.js';

@Module({
  providers: [{ provide: GITHUB_CLIENT, useClass: OctokitClient }],
  exports: [GITHUB_CLIENT],
})
export class GithubModule {}

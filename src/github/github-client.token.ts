// DI token for the GithubClient interface
export const GITHUB_CLIENT = Symbol('GITHUB_CLIENT');

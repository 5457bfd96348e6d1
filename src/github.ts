import * as github from '@actions/github'
import * as log from './log'
import { GitHubWorker } from './interfaces'

export function repositoryFromContext(): string {
  const { owner, repo } = github.context.repo
  return `${owner}/${repo}`
}

export class gitHubClient implements GitHubWorker {
  token: string
  owner: string
  repo: string

  constructor(token: string, repository: string) {
    const [owner, repo] = repository.split('/')
    if (!owner || !repo) {
      throw new Error(
        `Repository must look like 'owner/repo', got: ${repository}`
      )
    }
    this.token = token
    this.owner = owner
    this.repo = repo

    log.debug(`Runner registration target: ${this.owner}/${this.repo}`)
  }

  /**
   * Requests a short-lived token for registering a self-hosted runner on the
   * repository.
   */
  async getRegistrationToken(): Promise<string> {
    const target = `${this.owner}/${this.repo}`
    const octokit = github.getOctokit(this.token)
    let data: { token: string; expires_at: string }
    try {
      const response = await octokit.request(
        'POST /repos/{owner}/{repo}/actions/runners/registration-token',
        { owner: this.owner, repo: this.repo }
      )
      data = response.data
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new Error(
        `Failed to get a runner registration token for ${target}: ${message}`
      )
    }
    log.info(
      `Runner registration token for ${target} expires at ${data.expires_at}`
    )
    return data.token
  }
}

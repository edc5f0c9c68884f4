import { Controller, Post, Body, BadRequestException, NotFoundException } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { isContentAddressedTag } from '../../engine/image-reference';
import { PipelinesService } from '../pipelines/pipelines.service';
import { RunsService } from '../runs/runs.service';

type Payload = Record<string, unknown>;

function isRecord(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function text(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Extract repo identifier from GitHub/GitLab-style webhook payloads.
 * Pipelines are matched by pipelines.repository (e.g. full URL or "owner/repo").
 */
export function getRepoFromPayload(body: Payload): string | null {
  return (
    text(body.repo) ??
    // GitHub
    text(field(body.repository, 'full_name')) ??
    text(field(body.repository, 'clone_url')) ??
    // GitLab
    text(field(body.project, 'path_with_namespace')) ??
    text(field(body.project, 'web_url'))
  );
}

/** "refs/heads/main" → "main"; a plain branch field wins. Tags and other refs → null. */
export function getBranchFromPayload(body: Payload): string | null {
  const branch = text(body.branch);
  if (branch) return branch;
  const ref = text(body.ref);
  if (!ref) return null;
  return ref.startsWith('refs/heads/') ? ref.slice('refs/heads/'.length) : null;
}

/** Pushed commit: GitHub/GitLab "after", GitHub head_commit.id, or a plain "commit". */
export function getCommitFromPayload(body: Payload): string | null {
  return text(body.after) ?? text(field(body.head_commit, 'id')) ?? text(body.commit);
}

/** A push that deletes the branch carries `deleted: true` and an all-zero `after`. */
export function isBranchDeletion(body: Payload, commit: string): boolean {
  return body.deleted === true || /^0+$/.test(commit);
}

@Controller('webhooks/git')
@ApiTags('webhooks')
export class GitWebhookController {
  constructor(
    private readonly pipelinesService: PipelinesService,
    private readonly runsService: RunsService,
  ) {}

  /**
   * Receive a git push webhook (GitHub, GitLab, or any POST with repo/branch/commit).
   * Every pipeline tracking the pushed branch of the repository gets a run for the commit.
   */
  @Post('push')
  @ApiOperation({ summary: 'Receive a git push webhook and trigger runs' })
  @ApiBody({
    description:
      'GitHub/GitLab push payload. Repo comes from repo/repository/project, branch from branch/ref, commit from after/head_commit.id/commit. The full body is stored in trigger_metadata.',
    schema: { type: 'object', additionalProperties: true },
  })
  async handlePush(@Body() body: Payload) {
    const repo = getRepoFromPayload(body);
    if (!repo) {
      throw new BadRequestException(
        'Missing repo. Send repo, repository.full_name, repository.clone_url, or project.path_with_namespace',
      );
    }
    const commit = getCommitFromPayload(body);
    if (!commit) {
      throw new BadRequestException('Missing commit. Send after, head_commit.id, or commit');
    }
    if (isBranchDeletion(body, commit)) {
      return { triggered: [], ignored: 'Branch deletion' };
    }
    // Checked once up front so a bad commit never triggers some pipelines and not others.
    const tag = commit.trim().toLowerCase();
    if (!isContentAddressedTag(tag)) {
      throw new BadRequestException('commit must be a 7-40 character hex commit hash');
    }

    const pipelines = await this.pipelinesService.findByRepository(repo);
    if (pipelines.length === 0) {
      throw new NotFoundException(`No pipeline found for repository: ${repo}`);
    }

    const branch = getBranchFromPayload(body);
    const tracking = pipelines.filter((p) => branch !== null && p.branch === branch);
    if (tracking.length === 0) {
      return { triggered: [], ignored: `No pipeline tracks branch ${branch ?? '(none)'}` };
    }

    const triggered: Array<{ runId: string; pipelineId: string; status: string }> = [];
    for (const pipeline of tracking) {
      const run = await this.runsService.triggerRun(pipeline.id, tag, 'git_push', body);
      triggered.push({ runId: run.id, pipelineId: pipeline.id, status: run.status });
    }
    return { triggered };
  }
}

import type { Ledger } from '../ledger/ledger.js';
import { notifyEvaluation, type NotifyOptions } from '../notify/notifier.js';
import type { BuildRequest } from '../schemas.js';
import { errorMessage } from '../utils.js';
import type { CodeSynthesizer, FileMap, PublishResult, Publisher, SecretVerifier } from './collaborators.js';
import { withStandardFiles } from './standardFiles.js';

export type BuildErrorCode = 'secret_invalid' | 'deployment_not_found' | 'synthesis_failed' | 'publish_failed';

const STATUS_BY_CODE: Record<BuildErrorCode, number> = {
  secret_invalid: 401,
  deployment_not_found: 404,
  synthesis_failed: 502,
  publish_failed: 502,
};

export class BuildError extends Error {
  readonly code: BuildErrorCode;
  readonly statusCode: number;

  constructor(code: BuildErrorCode, message: string) {
    super(message);
    this.name = 'BuildError';
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }
}

export interface BuildResponse {
  success: true;
  message: string;
  data: {
    repo_url: string;
    pages_url: string;
    commit_sha: string;
    notification_sent: boolean;
    notification_attempts: number;
  };
  warning?: string;
}

export interface BuilderDeps {
  ledger: Ledger;
  synthesizer: CodeSynthesizer;
  publisher: Publisher;
  verifier: SecretVerifier;
  notify?: NotifyOptions;
  licenseHolder?: string;
  now?: () => Date;
}

/**
 * Build direction: turn a task request into a published page, remember the deployment so a
 * later round can revise it, and report the submission to the request's evaluation_url.
 */
export class Builder {
  constructor(private readonly deps: BuilderDeps) {}

  async build(req: BuildRequest): Promise<BuildResponse> {
    await this.authorize(req);
    const files = await this.synthesize(() =>
      this.deps.synthesizer.generate({ brief: req.brief, checks: req.checks, attachments: req.attachments, taskId: req.task })
    );
    return this.publishAndReport(req, files, 'built');
  }

  async revise(req: BuildRequest): Promise<BuildResponse> {
    await this.authorize(req);
    const deployment = await this.deps.ledger.getDeployment(req.task);
    if (!deployment) throw new BuildError('deployment_not_found', `No deployment recorded for task ${req.task}`);

    const revised = await this.synthesize(() =>
      this.deps.synthesizer.revise({ brief: req.brief, checks: req.checks, taskId: req.task, existingFiles: deployment.files })
    );
    // README is regenerated for the new round unless the revision supplies one.
    const kept: FileMap = { ...deployment.files };
    delete kept['README.md'];
    return this.publishAndReport(req, { ...kept, ...revised }, 'revised');
  }

  private async authorize(req: BuildRequest) {
    if (!(await this.deps.verifier.verify(req.email, req.secret))) {
      console.error(`[build] email=${req.email} task=${req.task} rejected: secret_invalid`);
      throw new BuildError('secret_invalid', 'Secret verification failed');
    }
  }

  private async synthesize(call: () => Promise<FileMap>): Promise<FileMap> {
    let files: FileMap;
    try {
      files = await call();
    } catch (err) {
      throw new BuildError('synthesis_failed', `Code synthesis failed: ${errorMessage(err)}`);
    }
    if (!Object.keys(files).length) throw new BuildError('synthesis_failed', 'Code synthesis returned no files');
    return files;
  }

  private async publishAndReport(req: BuildRequest, synthesized: FileMap, verb: 'built' | 'revised'): Promise<BuildResponse> {
    const files = withStandardFiles(synthesized, {
      taskId: req.task,
      round: req.round,
      brief: req.brief,
      holder: this.deps.licenseHolder ?? req.email,
      year: (this.deps.now?.() ?? new Date()).getUTCFullYear(),
    });

    let published: PublishResult;
    try {
      published = await this.deps.publisher.publish({ files, taskId: req.task, round: req.round });
    } catch (err) {
      throw new BuildError('publish_failed', `Publishing failed: ${errorMessage(err)}`);
    }
    if (!published.success) throw new BuildError('publish_failed', `Publishing failed: ${published.error}`);

    await this.deps.ledger.upsertDeployment({
      taskId: req.task,
      round: req.round,
      repoUrl: published.repoUrl,
      commitSha: published.commitSha,
      pagesUrl: published.pagesUrl,
      files,
    });
    console.log(`[build] task=${req.task} round=${req.round} ${verb} commit=${published.commitSha}`);

    const notified = await notifyEvaluation(
      {
        evaluationUrl: req.evaluation_url,
        email: req.email,
        taskId: req.task,
        round: req.round,
        nonce: req.nonce,
        repoUrl: published.repoUrl,
        commitSha: published.commitSha,
        pagesUrl: published.pagesUrl,
      },
      this.deps.notify
    );

    return {
      success: true,
      message: `Task ${req.task} round ${req.round} ${verb} and deployed`,
      data: {
        repo_url: published.repoUrl,
        pages_url: published.pagesUrl,
        commit_sha: published.commitSha,
        notification_sent: notified.success,
        notification_attempts: notified.attempts,
      },
      ...(notified.success ? {} : { warning: `Evaluation notification failed: ${notified.error ?? 'unknown error'}` }),
    };
  }
}

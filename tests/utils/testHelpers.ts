import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { JudgeClient, JudgeRequest, JudgeResponse } from '../../src/agents/judge';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'paper-screen-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function readLines(filePath: string): Promise<string[]> {
  const text = await fs.readFile(filePath, 'utf8');
  return text.split('\n').filter((line) => line.length > 0);
}

/**
 * Judge that answers from a script. A reply that is an Error is thrown
 * instead of returned.
 */
export class ScriptedJudge implements JudgeClient {
  readonly name = 'scripted';
  readonly requests: JudgeRequest[] = [];
  private next = 0;

  constructor(private readonly replies: Array<string | Error>) {}

  async classify(request: JudgeRequest): Promise<JudgeResponse> {
    this.requests.push(request);
    const reply = this.replies[this.next++];
    if (reply === undefined) {
      throw new Error('ScriptedJudge ran out of replies');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return { rawText: reply };
  }
}

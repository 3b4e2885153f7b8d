import { describe, it, expect } from '@jest/globals';
import { ConfigError } from '../src/agents/errors';
import { parseClassifyArgs, parseCollectArgs, parseFilterArgs } from '../src/config/runConfig';

describe('parseClassifyArgs', () => {
  it('reads short and long flags and fills defaults', () => {
    const config = parseClassifyArgs(['-c', 'cvpr', '-i', 'papers.json', '--topic', 'neural rendering']);

    expect(config).toEqual({
      modelType: 'deepseek',
      conference: 'cvpr',
      year: '2025',
      input: 'papers.json',
      topic: 'neural rendering',
      apiKey: undefined,
      output: undefined,
      accept: undefined,
    });
  });

  it('takes a negative verdict list in --accept=', () => {
    const config = parseClassifyArgs([
      '-c', 'iccv', '-y', '2023', '-i', 'in.json', '-t', 'slam', '--accept=-1,0', '-m', 'gemini',
    ]);

    expect(config.accept).toBe('-1,0');
    expect(config.year).toBe('2023');
    expect(config.modelType).toBe('gemini');
  });

  it('reports every missing required flag', () => {
    expect(() => parseClassifyArgs([])).toThrow(ConfigError);
    expect(() => parseClassifyArgs([])).toThrow('- topic: Provide -t / --topic');
    expect(() => parseClassifyArgs(['-c', 'cvpr', '-i', 'x.json', '-t', '   '])).toThrow(
      'Provide -t / --topic'
    );
  });

  it('rejects unknown flags', () => {
    expect(() => parseClassifyArgs(['--bogus'])).toThrow(ConfigError);
  });
});

describe('parseCollectArgs', () => {
  it('requires a conference and a search pattern', () => {
    expect(parseCollectArgs(['-c', 'cvpr', '-s', '(splat|nerf)'])).toEqual({
      conference: 'cvpr',
      year: '2025',
      search: '(splat|nerf)',
      input: undefined,
      output: undefined,
    });
    expect(() => parseCollectArgs(['-c', 'cvpr'])).toThrow('Provide -s / --search');
  });
});

describe('parseFilterArgs', () => {
  it('takes the report as a positional argument or --input', () => {
    expect(parseFilterArgs(['report.json', '-a', '1'])).toEqual({
      report: 'report.json',
      accept: '1',
      output: undefined,
    });
    expect(parseFilterArgs(['-i', 'run.jsonl']).report).toBe('run.jsonl');
  });

  it('requires a report path', () => {
    expect(() => parseFilterArgs([])).toThrow(ConfigError);
  });
});

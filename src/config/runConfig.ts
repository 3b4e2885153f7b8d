import { parseArgs } from 'util';
import { z } from 'zod';
import { ConfigError } from '../agents/errors';
import { formatValidationErrors, toError } from '../utils/validation';

const DEFAULT_YEAR = '2025';

const required = (flag: string) =>
  z.string({ required_error: `Provide ${flag}` }).trim().min(1, `Provide ${flag}`);

const CollectRunConfigSchema = z.object({
  conference: required('-c / --conf'),
  year: z.string().min(1).default(DEFAULT_YEAR),
  input: z.string().min(1).optional(),
  search: required('-s / --search'),
  output: z.string().min(1).optional(),
});

const ClassifyRunConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  modelType: z.string().min(1).default('deepseek'),
  conference: required('-c / --conf'),
  year: z.string().min(1).default(DEFAULT_YEAR),
  input: required('-i / --input'),
  output: z.string().min(1).optional(),
  topic: required('-t / --topic'),
  accept: z.string().optional(),
});

const FilterRunConfigSchema = z.object({
  report: required('a report or log path'),
  accept: z.string().optional(),
  output: z.string().min(1).optional(),
});

export type CollectRunConfig = z.infer<typeof CollectRunConfigSchema>;
export type ClassifyRunConfig = z.infer<typeof ClassifyRunConfigSchema>;
export type FilterRunConfig = z.infer<typeof FilterRunConfigSchema>;

function readArgs<T>(read: () => T): T {
  try {
    return read();
  } catch (error) {
    throw new ConfigError(toError(error).message);
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatValidationErrors(result.error));
  }
  return result.data;
}

export function parseCollectArgs(argv: string[]): CollectRunConfig {
  const { values } = readArgs(() =>
    parseArgs({
      args: argv,
      options: {
        conf: { type: 'string', short: 'c' },
        year: { type: 'string', short: 'y' },
        input: { type: 'string', short: 'i' },
        search: { type: 'string', short: 's' },
        output: { type: 'string', short: 'o' },
      },
    })
  );

  return validate(CollectRunConfigSchema, {
    conference: values.conf,
    year: values.year,
    input: values.input,
    search: values.search,
    output: values.output,
  });
}

export function parseClassifyArgs(argv: string[]): ClassifyRunConfig {
  const { values } = readArgs(() =>
    parseArgs({
      args: argv,
      options: {
        apikey: { type: 'string', short: 'k' },
        model: { type: 'string', short: 'm' },
        conf: { type: 'string', short: 'c' },
        year: { type: 'string', short: 'y' },
        input: { type: 'string', short: 'i' },
        output: { type: 'string', short: 'o' },
        topic: { type: 'string', short: 't' },
        accept: { type: 'string', short: 'a' },
      },
    })
  );

  return validate(ClassifyRunConfigSchema, {
    apiKey: values.apikey,
    modelType: values.model,
    conference: values.conf,
    year: values.year,
    input: values.input,
    output: values.output,
    topic: values.topic,
    accept: values.accept,
  });
}

export function parseFilterArgs(argv: string[]): FilterRunConfig {
  const { values, positionals } = readArgs(() =>
    parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        input: { type: 'string', short: 'i' },
        accept: { type: 'string', short: 'a' },
        output: { type: 'string', short: 'o' },
      },
    })
  );

  return validate(FilterRunConfigSchema, {
    report: values.input ?? positionals[0],
    accept: values.accept,
    output: values.output,
  });
}

import { describe, expect, it } from 'vitest';
import { parseCliArgs } from '../src/cli/args.js';
import { UsageError } from '../src/shared/errors.js';

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    expect(parseCliArgs(['rel-to-abs', 'docs'])).toEqual({
      command: 'rel-to-abs',
      path: 'docs',
      pattern: '**/*.md',
      exclude: 'absolute',
      output: '{filename}.absolute.md',
      location: null,
      dest: null,
      concurrency: 1,
      uploader: 's3',
      verbose: 0,
      uploaderFlags: {},
    });
  });

  it('reads short, long, inline and underscore spellings', () => {
    const options = parseCliArgs([
      'rel-to-abs',
      'post.md',
      '--s3_bucket',
      'b',
      '--s3_ACL=public-read',
      '--s3-override',
      '--s3-validate-etag=false',
      '-x',
      '4',
      '-u',
      'IMGUR',
      '-vv',
      '-o',
      '{filename}.web.md',
    ]);

    expect(options).toMatchObject({
      command: 'rel-to-abs',
      path: 'post.md',
      concurrency: 4,
      uploader: 'imgur',
      verbose: 2,
      output: '{filename}.web.md',
      uploaderFlags: { bucket: 'b', acl: 'public-read', override: 'true', validateEtag: 'false' },
    });
  });

  it('takes a following true/false word for switches', () => {
    const options = parseCliArgs(['rel-to-abs', '--s3_override', 'True', '--s3-validate-etag', 'no', 'post.md']);

    expect(options).toMatchObject({
      path: 'post.md',
      uploaderFlags: { override: 'True', validateEtag: 'no' },
    });
  });

  it('leaves a following path alone after a bare switch', () => {
    expect(parseCliArgs(['rel-to-abs', '--s3-override', 'post.md'])).toMatchObject({
      path: 'post.md',
      uploaderFlags: { override: 'true' },
    });
  });

  it('keeps an empty exclusion', () => {
    expect(parseCliArgs(['rel-to-abs', 'docs', '-e', ''])).toMatchObject({ exclude: '' });
  });

  it('returns help when asked', () => {
    expect(parseCliArgs(['--help'])).toEqual({ command: 'help' });
    expect(parseCliArgs(['rel-to-abs', 'docs', '-h'])).toEqual({ command: 'help' });
  });

  it.each([
    [['rel-to-abs', 'docs', '--bogus'], 'Unknown option: --bogus'],
    [['rel-to-abs', 'docs', '-p'], 'Missing value for -p'],
    [['rel-to-abs', 'docs', '-x', '0'], '--concurrency must be a positive integer, got "0"'],
    [['rel-to-abs', 'docs', '-u', 'ftp'], '--uploader must be one of s3, imgur; got "ftp"'],
    [['publish', 'docs'], 'Unknown command: publish'],
    [['rel-to-abs'], 'Missing <path>'],
    [[], 'Missing command'],
    [['rel-to-abs', 'a', 'b'], 'Unexpected argument: b'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new UsageError(message));
  });
});

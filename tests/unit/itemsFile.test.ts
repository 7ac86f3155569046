import fs from 'fs/promises';
import path from 'path';
import { readItemsFile } from '../../src/cli/runBatch.js';
import { FileSystemError, SchemaValidationError } from '../../src/errors/index.js';
import { createBatchSchema, workItemListSchema } from '../../src/validation/pipelineSchemas.js';
import { createTempDir } from '../utils/testDatabase.js';

describe('workItemListSchema', () => {
  it('should number items that have no id', () => {
    const parsed = workItemListSchema.parse([
      { title: ' Rates rise ', text: 'The central bank lifted rates.' },
      { id: 'custom', title: 'Storm warning', text: 'Heavy rain expected.', url: 'https://news.test/storm' },
      { title: 'Election night', text: 'Polls close at eight.' },
    ]);

    expect(parsed).toEqual([
      { id: 'item-1', title: 'Rates rise', text: 'The central bank lifted rates.' },
      { id: 'custom', title: 'Storm warning', text: 'Heavy rain expected.', url: 'https://news.test/storm' },
      { id: 'item-3', title: 'Election night', text: 'Polls close at eight.' },
    ]);
  });

  it('should reject duplicate ids', () => {
    const result = workItemListSchema.safeParse([
      { id: 'a', title: 'One', text: 'First.' },
      { id: 'a', title: 'Two', text: 'Second.' },
    ]);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map(issue => issue.message)).toEqual(['Duplicate item id: a']);
      expect(result.error.issues[0]?.path).toEqual([1, 'id']);
    }
  });

  it('should reject empty lists and blank fields', () => {
    expect(workItemListSchema.safeParse([]).success).toBe(false);
    expect(workItemListSchema.safeParse([{ title: '   ', text: 'Body.' }]).success).toBe(false);
  });

  it('should bound batch concurrency', () => {
    const items = [{ title: 'One', text: 'First.' }];
    expect(createBatchSchema.safeParse({ items, concurrency: 4 }).success).toBe(true);
    expect(createBatchSchema.safeParse({ items, concurrency: 0 }).success).toBe(false);
    expect(createBatchSchema.safeParse({ items, interItemDelayMs: -5 }).success).toBe(false);
  });
});

describe('readItemsFile', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await createTempDir();
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  async function writeFile(name: string, contents: string): Promise<string> {
    const filePath = path.join(directory, name);
    await fs.writeFile(filePath, contents, 'utf8');
    return filePath;
  }

  it('should read a bare array of items', async () => {
    const filePath = await writeFile('items.json', JSON.stringify([{ title: 'One', text: 'First.' }]));
    await expect(readItemsFile(filePath)).resolves.toEqual([{ id: 'item-1', title: 'One', text: 'First.' }]);
  });

  it('should read an object with an items list', async () => {
    const filePath = await writeFile('items.json', JSON.stringify({ items: [{ id: 'x', title: 'One', text: 'First.' }] }));
    await expect(readItemsFile(filePath)).resolves.toEqual([{ id: 'x', title: 'One', text: 'First.' }]);
  });

  it('should report malformed JSON', async () => {
    const filePath = await writeFile('items.json', '{ not json');
    await expect(readItemsFile(filePath)).rejects.toThrow(SchemaValidationError);
  });

  it('should report invalid items', async () => {
    const filePath = await writeFile('items.json', JSON.stringify([{ title: 'No text' }]));
    await expect(readItemsFile(filePath)).rejects.toThrow(`Items file ${filePath} is invalid`);
  });

  it('should report a missing file', async () => {
    await expect(readItemsFile(path.join(directory, 'missing.json'))).rejects.toThrow(FileSystemError);
  });
});

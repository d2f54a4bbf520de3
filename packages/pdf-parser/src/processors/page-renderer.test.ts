import { isCommandAvailable, spawnAsync } from '@invoice-audit/shared';
import { existsSync, mkdirSync, readdirSync } from 'node:fs';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import {
  MagickPageRenderer,
  PdftoppmPageRenderer,
  selectPageRenderer,
} from './page-renderer';

vi.mock('@invoice-audit/shared', () => ({
  spawnAsync: vi.fn(),
  isCommandAvailable: vi.fn(),
}));

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  readdirSync: vi.fn(),
}));

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const mockSpawnAsync = spawnAsync as Mock;
const mockIsCommandAvailable = isCommandAvailable as Mock;
const mockExistsSync = existsSync as Mock;
const mockReaddirSync = readdirSync as Mock;

describe('PdftoppmPageRenderer', () => {
  let renderer: PdftoppmPageRenderer;

  beforeEach(() => {
    vi.clearAllMocks();
    renderer = new PdftoppmPageRenderer(mockLogger);
    mockExistsSync.mockReturnValue(false);
    mockReaddirSync.mockReturnValue([]);
    mockSpawnAsync.mockResolvedValue({ code: 0, stdout: '', stderr: '' });
  });

  test('creates pages directory if it does not exist', async () => {
    await renderer.renderPages('/tmp/invoice.pdf', '/tmp/work');

    expect(mkdirSync).toHaveBeenCalledWith('/tmp/work/pages', {
      recursive: true,
    });
  });

  test('skips creating pages directory if it already exists', async () => {
    mockExistsSync.mockReturnValue(true);

    await renderer.renderPages('/tmp/invoice.pdf', '/tmp/work');

    expect(mkdirSync).not.toHaveBeenCalled();
  });

  test('calls pdftoppm at 150 DPI by default', async () => {
    await renderer.renderPages('/tmp/invoice.pdf', '/tmp/work');

    expect(mockSpawnAsync).toHaveBeenCalledWith('pdftoppm', [
      '-r',
      '150',
      '-png',
      '/tmp/invoice.pdf',
      '/tmp/work/pages/page',
    ]);
  });

  test('returns zero-padded page files in numeric order', async () => {
    mockReaddirSync.mockReturnValue([
      'page-10.png',
      'page-02.png',
      'page-01.png',
      'notes.txt',
    ]);

    const result = await renderer.renderPages('/tmp/invoice.pdf', '/tmp/work');

    expect(result).toEqual({
      pageCount: 3,
      pagesDir: '/tmp/work/pages',
      pageFiles: [
        '/tmp/work/pages/page-01.png',
        '/tmp/work/pages/page-02.png',
        '/tmp/work/pages/page-10.png',
      ],
    });
  });

  test('throws when pdftoppm fails', async () => {
    mockSpawnAsync.mockResolvedValue({
      code: 1,
      stdout: '',
      stderr: 'I/O Error: Couldn\'t open file',
    });

    await expect(
      renderer.renderPages('/tmp/invoice.pdf', '/tmp/work'),
    ).rejects.toThrow(
      "[PageRenderer] Failed to render PDF pages: I/O Error: Couldn't open file",
    );
  });
});

describe('MagickPageRenderer', () => {
  let renderer: MagickPageRenderer;

  beforeEach(() => {
    vi.clearAllMocks();
    renderer = new MagickPageRenderer(mockLogger);
    mockExistsSync.mockReturnValue(true);
    mockReaddirSync.mockReturnValue([]);
    mockSpawnAsync.mockResolvedValue({ code: 0, stdout: '', stderr: '' });
  });

  test('calls magick with density and flattened background', async () => {
    await renderer.renderPages('/tmp/invoice.pdf', '/tmp/work', { dpi: 72 });

    expect(mockSpawnAsync).toHaveBeenCalledWith('magick', [
      '-density',
      '72',
      '/tmp/invoice.pdf',
      '-background',
      'white',
      '-alpha',
      'remove',
      '-alpha',
      'off',
      '/tmp/work/pages/page_%d.png',
    ]);
  });

  test('returns page files sorted numerically', async () => {
    mockReaddirSync.mockReturnValue([
      'page_2.png',
      'page_0.png',
      'page_10.png',
      'page_1.png',
      'thumbnail.png',
    ]);

    const result = await renderer.renderPages('/tmp/invoice.pdf', '/tmp/work');

    expect(result.pageFiles).toEqual([
      '/tmp/work/pages/page_0.png',
      '/tmp/work/pages/page_1.png',
      '/tmp/work/pages/page_2.png',
      '/tmp/work/pages/page_10.png',
    ]);
  });

  test('logs rendering start and completion', async () => {
    mockReaddirSync.mockReturnValue(['page_0.png', 'page_1.png']);

    await renderer.renderPages('/tmp/invoice.pdf', '/tmp/work');

    expect(mockLogger.info).toHaveBeenCalledWith(
      '[PageRenderer] Rendering PDF at 150 DPI (magick)...',
    );
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[PageRenderer] Rendered 2 pages to /tmp/work/pages',
    );
  });

  test('uses a fallback message when stderr is empty', async () => {
    mockSpawnAsync.mockResolvedValue({ code: 1, stdout: '', stderr: '' });

    await expect(
      renderer.renderPages('/tmp/invoice.pdf', '/tmp/work'),
    ).rejects.toThrow('[PageRenderer] Failed to render PDF pages: Unknown error');
  });
});

describe('selectPageRenderer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test('prefers pdftoppm when available', async () => {
    mockIsCommandAvailable.mockResolvedValue(true);

    const renderer = await selectPageRenderer(mockLogger);

    expect(renderer).toBeInstanceOf(PdftoppmPageRenderer);
    expect(renderer?.backend).toBe('pdftoppm');
    expect(mockIsCommandAvailable).toHaveBeenCalledTimes(1);
    expect(mockIsCommandAvailable).toHaveBeenCalledWith('pdftoppm', ['-v']);
  });

  test('falls back to ImageMagick when pdftoppm is missing', async () => {
    mockIsCommandAvailable
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true);

    const renderer = await selectPageRenderer(mockLogger);

    expect(renderer).toBeInstanceOf(MagickPageRenderer);
    expect(mockIsCommandAvailable).toHaveBeenLastCalledWith('magick', [
      '-version',
    ]);
  });

  test('returns null when no backend is available', async () => {
    mockIsCommandAvailable.mockResolvedValue(false);

    await expect(selectPageRenderer(mockLogger)).resolves.toBeNull();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[PageRenderer] No page renderer available; OCR is disabled',
    );
  });
});

/**
 * Opening exported charts in the browser
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import open from 'open';
import { buildHeatmapFigure, exportFigure } from '../../portfolio/charts';
import { SKILLS_BY_ROLE } from '../../portfolio/data';

vi.mock('open', () => ({ default: vi.fn() }));

describe('exportFigure with show', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'portfolio-show-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.mocked(open).mockClear();
  });

  it('should open the written file', async () => {
    const outputPath = path.join(tempDir, 'heatmap.html');
    const written = await exportFigure(buildHeatmapFigure(SKILLS_BY_ROLE), 'heatmap.html', {
      outputPath,
      plotlyJs: 'cdn',
      show: true
    });

    expect(written).toBe(outputPath);
    expect(fs.existsSync(outputPath)).toBe(true);
    expect(vi.mocked(open)).toHaveBeenCalledTimes(1);
    expect(vi.mocked(open)).toHaveBeenCalledWith(outputPath);
  });

  it('should leave the browser alone by default', async () => {
    const outputPath = path.join(tempDir, 'quiet.html');
    await exportFigure(buildHeatmapFigure(SKILLS_BY_ROLE), 'quiet.html', {
      outputPath,
      plotlyJs: 'cdn'
    });

    expect(vi.mocked(open)).not.toHaveBeenCalled();
  });
});

import { describe, expect, it } from 'vitest';

import { catchError } from '../test-utils/errors.js';
import { checkpointFileName, locateArtifacts } from './artifacts.js';

describe('checkpointFileName', () => {
  it('should zero-pad the epoch to three digits', () => {
    expect(checkpointFileName(7)).toBe('model_checkpoint_007.pth.tar');
    expect(checkpointFileName(0)).toBe('model_checkpoint_000.pth.tar');
  });

  it('should not truncate longer epochs', () => {
    expect(checkpointFileName(1234)).toBe('model_checkpoint_1234.pth.tar');
  });

  it('should reject negative and fractional epochs', () => {
    for (const epoch of [-1, 1.5]) {
      expect(catchError(() => checkpointFileName(epoch))).toMatchObject({
        kind: 'InvalidInput',
      });
    }
  });
});

describe('locateArtifacts', () => {
  it('should derive the result directory layout', () => {
    expect(locateArtifacts('/doublet_results/agnn01')).toEqual({
      resultPath: '/doublet_results/agnn01',
      configFile: '/doublet_results/agnn01/config.pkl',
      summaryFile: '/doublet_results/agnn01/summaries_0.csv',
      checkpointDir: '/doublet_results/agnn01/checkpoints',
      checkpointFile: null,
      upstreamCheckpointDir: null,
    });
  });

  it('should include the epoch checkpoint and upstream checkpoints when given', () => {
    const artifacts = locateArtifacts('/triplet_results/agnn01', {
      epoch: 31,
      upstreamResultPath: '/doublet_results/agnn01',
    });

    expect(artifacts.checkpointFile).toBe(
      '/triplet_results/agnn01/checkpoints/model_checkpoint_031.pth.tar',
    );
    expect(artifacts.upstreamCheckpointDir).toBe(
      '/doublet_results/agnn01/checkpoints',
    );
  });
});

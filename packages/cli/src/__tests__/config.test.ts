import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { resolveSetupConfig, slugify } from '../config';
import { isValidProjectId } from '../gcp/firebase';

describe('slugify', () => {
  it('should prefix with the namespace and hyphenate spaces', () => {
    expect(slugify('Space Game')).toBe('hcg-space-game');
  });

  it('should lowercase', () => {
    expect(slugify('ALLCAPS')).toBe('hcg-allcaps');
  });

  it('should replace every space', () => {
    expect(slugify('My  Big Game')).toBe('hcg-my--big-game');
  });

  it('should keep other characters as they are', () => {
    expect(slugify("Tom's Game")).toBe("hcg-tom's-game");
  });
});

describe('isValidProjectId', () => {
  it('should accept slugs of ordinary names', () => {
    expect(isValidProjectId(slugify('Space Game'))).toEqual({ valid: true });
  });

  it('should reject IDs that are too short', () => {
    expect(isValidProjectId('hcg')).toEqual({
      valid: false,
      error: 'Project ID must be 6-30 characters',
    });
  });

  it('should reject IDs that do not start with a letter', () => {
    expect(isValidProjectId('1abcdef').error).toBe('Project ID must start with a lowercase letter');
  });

  it('should reject IDs that end with a symbol', () => {
    expect(isValidProjectId('hcg-game!').error).toBe('Project ID must end with a letter or digit');
  });

  it('should reject characters outside letters, digits and hyphens', () => {
    expect(isValidProjectId(slugify("Tom's Game")).error).toBe(
      'Project ID can only contain lowercase letters, digits, and hyphens'
    );
  });
});

describe('resolveSetupConfig', () => {
  it('should derive the project ID and resolve the project root', () => {
    const config = resolveSetupConfig('Space Game', { cwd: 'games/space' });

    expect(config).toEqual({
      gameName: 'Space Game',
      projectId: 'hcg-space-game',
      projectRoot: path.resolve('games/space'),
      skipFirebase: false,
      verbose: false,
    });
  });

  it('should default to the current directory', () => {
    const config = resolveSetupConfig('Space Game', { skipFirebase: true, verbose: true });

    expect(config.projectRoot).toBe(process.cwd());
    expect(config.skipFirebase).toBe(true);
    expect(config.verbose).toBe(true);
  });
});

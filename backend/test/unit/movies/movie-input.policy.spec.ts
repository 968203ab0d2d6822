import { describe, it, expect } from 'vitest';
import {
  getMovieInputFailure,
  normalizeMovieInput,
} from '../../../src/modules/movies/policies/movie-input.policy';

describe('movie-input.policy', () => {
  it('normalizes title, blank genre and missing year', () => {
    expect(normalizeMovieInput({ title: '  Heat ', genre: '  ' })).toEqual({
      title: 'Heat',
      releaseYear: null,
      genre: null,
    });

    expect(normalizeMovieInput({ title: 'Heat', releaseYear: 1995, genre: ' Crime ' })).toEqual({
      title: 'Heat',
      releaseYear: 1995,
      genre: 'Crime',
    });
  });

  it('accepts a plain catalog entry', () => {
    expect(getMovieInputFailure({ title: 'Heat', releaseYear: 1995, genre: 'Crime' })).toBeNull();
  });

  it('rejects a blank or over-long title', () => {
    expect(getMovieInputFailure({ title: '', releaseYear: null, genre: null })).toBe(
      'Title is required.',
    );
    expect(getMovieInputFailure({ title: 't'.repeat(201), releaseYear: null, genre: null })).toBe(
      'Title must be at most 200 characters.',
    );
  });

  it('rejects implausible years and long genres', () => {
    expect(getMovieInputFailure({ title: 'Heat', releaseYear: 1869, genre: null })).toBe(
      'Release year must be a whole number from 1870 to 2100.',
    );
    expect(getMovieInputFailure({ title: 'Heat', releaseYear: 1995.5, genre: null })).toBe(
      'Release year must be a whole number from 1870 to 2100.',
    );
    expect(getMovieInputFailure({ title: 'Heat', releaseYear: null, genre: 'g'.repeat(51) })).toBe(
      'Genre must be at most 50 characters.',
    );
  });
});

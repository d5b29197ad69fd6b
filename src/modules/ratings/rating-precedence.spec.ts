import { createRawRating } from './raw-rating';
import { mergeByPrecedence } from './rating-precedence';

describe('mergeByPrecedence', () => {
  it("keeps the regional catalog's imdb figure over the ratings aggregator's", () => {
    const merged = mergeByPrecedence({
      ratings: [createRawRating('imdb', 8.3, 10, 900000), createRawRating('metacritic', 76, 100)],
      regional: [createRawRating('imdb', 8.2, 10, 910000), createRawRating('kinopoisk', 8.5, 10)],
      primary: [createRawRating('tmdb', 7.9, 10)],
    });

    expect(merged.get('imdb')).toEqual({ provider: 'regional', rating: createRawRating('imdb', 8.2, 10, 910000) });
    expect([...merged.keys()]).toEqual(['tmdb', 'imdb', 'kinopoisk', 'metacritic']);
  });

  it('follows a custom precedence order', () => {
    const merged = mergeByPrecedence(
      {
        ratings: [createRawRating('imdb', 8.3, 10)],
        regional: [createRawRating('imdb', 8.2, 10)],
      },
      ['ratings', 'regional'],
    );
    expect(merged.get('imdb')?.provider).toBe('ratings');
  });

  it('keeps the first report when one provider repeats a source', () => {
    const merged = mergeByPrecedence({ ratings: [createRawRating('imdb', 7, 10), createRawRating('imdb', 9, 10)] });
    expect(merged.get('imdb')?.rating.value).toBe(7);
  });
});

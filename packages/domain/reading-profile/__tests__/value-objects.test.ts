/**
 * Value Objects ユニットテスト
 *
 * 不変性・等価性・バリデーション
 */
import { describe, it, expect } from 'vitest';
import { UserId } from '../value-objects/user-id';
import { BookId } from '../value-objects/book-id';
import { Genre } from '../value-objects/genre';
import { Rating } from '../value-objects/rating';
import { BlockList } from '../value-objects/block-list';
import { ExplicitPreferences } from '../value-objects/explicit-preferences';
import { ValidationError } from '../../shared/errors';

describe('UserId Value Object', () => {
  it('should create from a non-empty string', () => {
    expect(UserId.fromString('u1').value).toBe('u1');
  });

  it('should throw ValidationError for empty or whitespace-only values', () => {
    expect(() => UserId.fromString('')).toThrow(ValidationError);
    expect(() => UserId.fromString('   ')).toThrow('UserId cannot be empty');
  });

  it('should be equal when values are same', () => {
    expect(UserId.fromString('u1').equals(UserId.fromString('u1'))).toBe(true);
    expect(UserId.fromString('u1').equals(UserId.fromString('u2'))).toBe(false);
  });
});

describe('BookId Value Object', () => {
  it('should reject blank ids', () => {
    expect(() => BookId.fromString(' ')).toThrow(ValidationError);
    expect(BookId.isValid('b1')).toBe(true);
  });
});

describe('Genre Value Object', () => {
  it('should normalize to trimmed title case', () => {
    expect(Genre.create('  science fiction ').name).toBe('Science Fiction');
    expect(Genre.create('HORROR').name).toBe('Horror');
    expect(Genre.create('sci-fi').name).toBe('Sci-Fi');
  });

  it('should treat differently cased names as equal', () => {
    const a = Genre.create('horror');
    const b = Genre.create('Horror');
    const c = Genre.create('  horror  ');
    expect(a.equals(b)).toBe(true);
    expect(b.equals(c)).toBe(true);
  });

  it('should be idempotent when normalizing', () => {
    const once = Genre.normalize('  historical FICTION');
    expect(once).toBe('Historical Fiction');
    expect(Genre.normalize(once)).toBe(once);
  });

  it('should throw for empty names', () => {
    expect(() => Genre.create('')).toThrow('Genre name cannot be empty');
    expect(() => Genre.create('  \t ')).toThrow(ValidationError);
  });
});

describe('Rating Value Object', () => {
  it.each([1, 2, 3, 4, 5])('should accept %i', (value) => {
    expect(Rating.create(value).value).toBe(value);
  });

  it.each([0, 6, -1, 100])('should reject out-of-range value %i', (value) => {
    expect(() => Rating.create(value)).toThrow('Rating must be between 1 and 5');
  });

  it('should reject non-integers', () => {
    expect(() => Rating.create(3.5)).toThrow('Rating must be an integer');
    expect(() => Rating.create(Number.NaN)).toThrow(ValidationError);
  });
});

describe('BlockList Value Object', () => {
  it('should return a new instance on add and leave the original untouched', () => {
    const empty = BlockList.empty();
    const one = empty.add('b1');

    expect(one).not.toBe(empty);
    expect(empty.contains('b1')).toBe(false);
    expect(one.contains('b1')).toBe(true);
  });

  it('should never hold duplicates', () => {
    const list = BlockList.empty().add('b1').add('b1');
    expect(list.size).toBe(1);
    expect(BlockList.from(['b1', 'b2', 'b1']).toArray()).toEqual(['b1', 'b2']);
  });

  it('should return a new instance on remove', () => {
    const list = BlockList.from(new Set(['b1', 'b2']));
    const removed = list.remove('b1');

    expect(removed.toArray()).toEqual(['b2']);
    expect(list.toArray()).toEqual(['b1', 'b2']);
    expect(list.remove('missing').equals(list)).toBe(true);
  });

  it('should compare as sets', () => {
    expect(BlockList.from(['b1', 'b2']).equals(BlockList.from(['b2', 'b1']))).toBe(true);
    expect(BlockList.from(['b1']).equals(BlockList.from(['b1', 'b2']))).toBe(false);
  });

  it('should reject input that is not set-like', () => {
    const notSetLike: unknown = 'b1,b2';
    expect(() => BlockList.from(notSetLike as string[])).toThrow('book_ids must be a set or an array');
  });

  it('should not expose its internal array', () => {
    const list = BlockList.from(['b1']);
    const ids = list.toArray();
    ids.push('b2');
    expect(list.toArray()).toEqual(['b1']);
  });
});

describe('ExplicitPreferences Value Object', () => {
  const genres = ['Fantasy', 'Horror', 'Romance', 'Mystery', 'Poetry'].map((name) => Genre.create(name));

  it('should append genres in order', () => {
    const preferences = ExplicitPreferences.empty()
      .addGenre(Genre.create('fantasy'))
      .addGenre(Genre.create('horror'));

    expect(preferences.names()).toEqual(['Fantasy', 'Horror']);
  });

  it('should reject a sixth genre', () => {
    const full = ExplicitPreferences.of(genres);
    expect(full.size).toBe(5);
    expect(() => full.addGenre(Genre.create('Drama'))).toThrow('Cannot add more than 5 favorite genres');
  });

  it('should reject a duplicate by normalized name', () => {
    const preferences = ExplicitPreferences.empty().addGenre(Genre.create('Fantasy'));
    expect(() => preferences.addGenre(Genre.create('  fantasy'))).toThrow("Genre 'Fantasy' already exists");
  });

  it('should not mutate the previous instance', () => {
    const before = ExplicitPreferences.empty();
    const after = before.addGenre(Genre.create('Fantasy'));

    expect(before.size).toBe(0);
    expect(after.size).toBe(1);
  });

  it('should treat removing an absent genre as a no-op', () => {
    const preferences = ExplicitPreferences.of([Genre.create('Fantasy')]);
    const result = preferences.removeGenre('Horror');

    expect(result.equals(preferences)).toBe(true);
    expect(result.names()).toEqual(['Fantasy']);
  });

  it('should compare genres in order', () => {
    const fantasyFirst = ExplicitPreferences.of([Genre.create('Fantasy'), Genre.create('Horror')]);

    expect(fantasyFirst.equals(ExplicitPreferences.of([Genre.create('fantasy'), Genre.create('horror')]))).toBe(true);
    expect(fantasyFirst.equals(ExplicitPreferences.of([Genre.create('Horror'), Genre.create('Fantasy')]))).toBe(false);
  });

  it('should look up and remove by normalized name', () => {
    const preferences = ExplicitPreferences.of([Genre.create('Science Fiction'), Genre.create('Horror')]);

    expect(preferences.hasGenre('science fiction')).toBe(true);
    expect(preferences.removeGenre(' SCIENCE fiction ').names()).toEqual(['Horror']);
  });

  it('should reject construction from more than 5 genres', () => {
    expect(() => ExplicitPreferences.of([...genres, Genre.create('Drama')])).toThrow(
      'Maximum 5 favorite genres allowed'
    );
  });

  it('should freeze its genre list', () => {
    const preferences = ExplicitPreferences.of([Genre.create('Fantasy')]);
    expect(Object.isFrozen(preferences.genres)).toBe(true);
  });
});

import { ReadingProfile } from '../aggregates/reading-profile';
import { ReadingHistoryItem } from '../entities/reading-history-entry';

export interface ProfileSnapshotData {
  userId: string;
  favoriteGenres: string[];
  bookCount: number;
  averageRating: number;
  blockedItemIds: string[];
  history: ReadingHistoryItem[];
}

/**
 * プロファイルスナップショット（Read Model）
 *
 * 集約から都度計算される非正規化ビュー。永続化しない。
 */
export class ProfileSnapshot {
  readonly userId: string;
  readonly favoriteGenres: readonly string[];
  readonly bookCount: number;
  readonly averageRating: number;
  readonly blockedItemIds: readonly string[];
  readonly history: readonly Readonly<ReadingHistoryItem>[];

  private constructor(data: ProfileSnapshotData) {
    this.userId = data.userId;
    this.favoriteGenres = Object.freeze([...data.favoriteGenres]);
    this.bookCount = data.bookCount;
    this.averageRating = data.averageRating;
    this.blockedItemIds = Object.freeze([...data.blockedItemIds]);
    this.history = Object.freeze(data.history.map((item) => Object.freeze({ ...item })));
    Object.freeze(this);
  }

  static fromAggregate(profile: ReadingProfile): ProfileSnapshot {
    const history = profile.readingHistoryList();
    const ratings = history
      .map((item) => item.rating)
      .filter((rating): rating is number => rating !== null);

    return new ProfileSnapshot({
      userId: profile.userId.value,
      favoriteGenres: profile.favoriteGenreNames(),
      bookCount: history.length,
      averageRating: ProfileSnapshot.average(ratings),
      blockedItemIds: profile.blockedItemIds(),
      history,
    });
  }

  /**
   * 平均（小数第2位で丸め、評価なしは 0）
   */
  private static average(ratings: number[]): number {
    if (ratings.length === 0) {
      return 0;
    }
    const sum = ratings.reduce((total, rating) => total + rating, 0);
    return roundHalfEven(sum / ratings.length, 2);
  }

  toJSON(): ProfileSnapshotData {
    return {
      userId: this.userId,
      favoriteGenres: [...this.favoriteGenres],
      bookCount: this.bookCount,
      averageRating: this.averageRating,
      blockedItemIds: [...this.blockedItemIds],
      history: this.history.map((item) => ({ ...item })),
    };
  }
}

/**
 * 偶数丸め（銀行丸め）
 *
 * double の正確な二進値で判定する。17 / 8 = 2.125 は 2.12 になり、
 * 2.675 は double では 2.675 より僅かに小さいため 2.67 になる。
 */
export function roundHalfEven(value: number, digits: number): number {
  let mantissa = value;
  let exponent = 0n;
  while (!Number.isInteger(mantissa)) {
    mantissa *= 2;
    exponent += 1n;
  }

  const denominator = 1n << exponent;
  const scaled = BigInt(mantissa) * 10n ** BigInt(digits);
  let quotient = scaled / denominator;
  let remainder = scaled % denominator;
  if (remainder < 0n) {
    // BigInt の除算は 0 方向に切り捨てる
    quotient -= 1n;
    remainder += denominator;
  }

  const twiceRemainder = 2n * remainder;
  if (twiceRemainder > denominator || (twiceRemainder === denominator && quotient % 2n !== 0n)) {
    quotient += 1n;
  }
  return Number(quotient) / 10 ** digits;
}

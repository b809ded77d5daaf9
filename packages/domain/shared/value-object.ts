/**
 * 値オブジェクト基底クラス
 *
 * props は凍結して保持し、変更は常に新しいインスタンスを返す。
 * 等価性は equalityKey() の一致で判定する。既定ではキー順に依存しない
 * props の正規化表現を使い、集合のように順序を問わない値はサブクラスで上書きする。
 */
export abstract class ValueObject<T extends Record<string, unknown>> {
  protected readonly props: Readonly<T>;

  protected constructor(props: T) {
    this.props = Object.freeze({ ...props });
  }

  equals(other: ValueObject<T> | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }
    if (other.constructor !== this.constructor) {
      return false;
    }
    return this.equalityKey() === other.equalityKey();
  }

  protected equalityKey(): string {
    return ValueObject.canonicalize(this.props);
  }

  private static canonicalize(value: unknown): string {
    if (value instanceof ValueObject) {
      return `${value.constructor.name}(${value.equalityKey()})`;
    }
    if (Array.isArray(value)) {
      return `[${value.map((item: unknown) => ValueObject.canonicalize(item)).join(',')}]`;
    }
    if (typeof value === 'object' && value !== null) {
      const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      return `{${entries.map(([key, inner]) => `${JSON.stringify(key)}:${ValueObject.canonicalize(inner)}`).join(',')}}`;
    }
    return JSON.stringify(value);
  }
}

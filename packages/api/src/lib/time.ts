// gpg_keys stores timestamps as epoch seconds; the domain works with Date.

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function fromNullableUnixSeconds(seconds: number | null): Date | null {
  return seconds === null ? null : fromUnixSeconds(seconds);
}

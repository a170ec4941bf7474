export function currentUnixTime(): number {
  return Math.floor(Date.now() / 1000);
}

export function elapsedIntervals(
  fromUnix: number,
  toUnix: number,
  intervalSeconds: number
): number {
  if (toUnix <= fromUnix) {
    return 0;
  }
  return Math.floor((toUnix - fromUnix) / intervalSeconds);
}

export type Clock = {
  /** Wall-clock time in (fractional) epoch seconds. */
  nowSeconds(): number;
};

export const systemClock: Clock = {
  nowSeconds: () => Date.now() / 1000
};

export const fixedClock = (seconds: number): Clock => ({
  nowSeconds: () => seconds
});

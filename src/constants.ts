/***************** Tick bounds *****************/
export const MIN_TICK = -887272;
export const MAX_TICK = 887272;

/***************** Sqrt price bounds (Q64.96) *****************/
// tickToSqrtPrice(MIN_TICK) and tickToSqrtPrice(MAX_TICK)
export const MIN_SQRT_RATIO = 4295128739n;
export const MAX_SQRT_RATIO =
  1461446703485210103287273052203988822378723970342n;

/***************** Fixed-point scales *****************/
export const RESOLUTION = 96n;
export const Q96 = 1n << RESOLUTION;

/***************** Integer widths *****************/
export const MAX_UINT128 = (1n << 128n) - 1n;
export const MAX_UINT160 = (1n << 160n) - 1n;
export const MAX_UINT256 = (1n << 256n) - 1n;
export const MAX_INT128 = (1n << 127n) - 1n;
export const MIN_INT128 = -(1n << 127n);
export const MAX_INT256 = (1n << 255n) - 1n;
export const MIN_INT256 = -(1n << 255n);

/***************** Fees *****************/
// fee rate in millionths, 3000 = 0.30%
export const DEFAULT_FEE_PIPS = 3000;
export const FEE_DENOMINATOR = 1_000_000;

/***************** Tick search *****************/
// how far findNextInitializedTick looks before returning the window boundary
export const DEFAULT_TICK_SEARCH_WINDOW = 2560;

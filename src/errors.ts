export enum PoolErrorCode {
  ValidationError = `ValidationError`,
  InsufficientFunds = `InsufficientFunds`,
  InsufficientAllowance = `InsufficientAllowance`,
  InsufficientLiquidity = `InsufficientLiquidity`,
  SlippageExceeded = `SlippageExceeded`,
  ArithmeticOverflow = `ArithmeticOverflow`,
  PriceOutOfRange = `PriceOutOfRange`,
  Reentrancy = `Reentrancy`,
}

export class PoolError extends Error {
  override message: string;

  errorCode: PoolErrorCode;

  constructor(message: string, errorCode: PoolErrorCode) {
    super(message);
    this.name = "PoolError";
    this.message = message;
    this.errorCode = errorCode;
  }

  static isPoolErrorCode(e: unknown, code: PoolErrorCode): boolean {
    return e instanceof PoolError && e.errorCode === code;
  }
}

export const validationError = (message: string) =>
  new PoolError(message, PoolErrorCode.ValidationError);

export const overflowError = (message: string) =>
  new PoolError(message, PoolErrorCode.ArithmeticOverflow);

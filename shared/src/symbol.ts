export class SymbolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SymbolError";
  }
}

const SYMBOL_PATTERN = /^[A-Za-z0-9.-]{1,20}$/;

export function isValidSymbol(symbol: string): boolean {
  return SYMBOL_PATTERN.test(symbol);
}

export function normalizeSymbol(symbol: string): string {
  const trimmed = symbol.trim();
  if (!isValidSymbol(trimmed)) {
    throw new SymbolError(`Invalid symbol: ${symbol}`);
  }
  return trimmed.toUpperCase();
}

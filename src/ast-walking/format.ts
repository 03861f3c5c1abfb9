// A positive width right-justifies, a negative one left-justifies.
const justify = (text: string, width: number): string => {
  if (width > 0) return text.padStart(width);
  if (width < 0) return text.padEnd(-width);
  return text;
};

// Adds one to a string of decimal digits, keeping its length unless it
// carries out of the top digit.
const increment = (digits: string): string =>
  (BigInt(digits) + 1n).toString().padStart(digits.length, "0");

/**
 * Fixed point with half-up rounding on the shortest decimal form of the
 * value, so 1.005 gives "1.01" and 1e22 prints all of its digits.
 */
const toFixedPoint = (value: number, decimals: number): string => {
  if (!Number.isFinite(value)) return String(value);

  const [mantissa, exponent = "0"] = String(Math.abs(value)).split("e");
  const [whole, fraction = ""] = mantissa.split(".");
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);

  let intPart: string;
  let fracPart: string;
  if (point <= 0) {
    intPart = "0";
    fracPart = "0".repeat(-point) + digits;
  } else if (point >= digits.length) {
    intPart = digits + "0".repeat(point - digits.length);
    fracPart = "";
  } else {
    intPart = digits.slice(0, point);
    fracPart = digits.slice(point);
  }

  if (fracPart.length <= decimals) {
    fracPart = fracPart.padEnd(decimals, "0");
  } else {
    const roundUp = fracPart[decimals] >= "5";
    fracPart = fracPart.slice(0, decimals);
    if (roundUp) {
      const all = increment(intPart + fracPart);
      intPart = all.slice(0, all.length - decimals);
      fracPart = all.slice(all.length - decimals);
    }
  }

  intPart = intPart.replace(/^0+(?=\d)/, "");
  const sign = value < 0 ? "-" : "";
  return decimals > 0 ? `${sign}${intPart}.${fracPart}` : `${sign}${intPart}`;
};

/** Fixed-point rendering used by `write(x:width:decimals)` */
export const formatNumber = (
  value: number,
  width: number = 0,
  decimals: number = 0,
): string =>
  justify(
    toFixedPoint(value, Math.max(Math.trunc(decimals), 0)),
    Math.trunc(width),
  );

export const formatString = (value: string, width: number = 0): string =>
  justify(value, Math.trunc(width));

function toCents(dollars: number): number {
  return Math.round(dollars * 100);
}

function toDollars(cents: number): number {
  return cents / 100;
}

function formatMoney(amount: number, fractionDigits = 2): string {
  const abs = Math.abs(amount).toLocaleString('en-US', {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });
  return amount < 0 ? `-$${abs}` : `$${abs}`;
}

export { toCents, toDollars, formatMoney };

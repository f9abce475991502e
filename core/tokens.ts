// Rough heuristic: one token per four characters.
const estimateTokens = (text: string) => {
  if (!text) {
    return 0;
  }
  return Math.max(1, Math.ceil(text.length / 4));
};

const formatTokens = (count: number) => {
  if (count >= 1000) {
    const shortened = Math.round((count / 1000) * 10) / 10;
    return `${shortened % 1 === 0 ? shortened.toFixed(0) : shortened}K`;
  }
  return `${count}`;
};

export { estimateTokens, formatTokens };

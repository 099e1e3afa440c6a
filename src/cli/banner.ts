const BANNER = `
  ┌─┐┌─┐┌─┐┌─┐┬─┐
  ├─┘├─┤│  ├┤ ├┬┘
  ┴  ┴ ┴└─┘└─┘┴└─
`;

const TAGLINES = [
  "The right nudge at the right time.",
  "Small steps, every day.",
  "Fewer pings, better timing.",
  "Keeps pace so you don't have to.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  v${version}: ${tagline}\n`);
}

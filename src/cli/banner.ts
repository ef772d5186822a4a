const BANNER = `
  ┌┬┐┬ ┬┬─┐┌┐┌┬─┐┌─┐┬  ┌─┐┬ ┬
   │ │ │├┬┘│││├┬┘├┤ │  ├─┤└┬┘
   ┴ └─┘┴└─┘└┘┴└─└─┘┴─┘┴ ┴ ┴
`;

const TAGLINES = [
  "One burst in, one reply out.",
  "Let them finish typing.",
  "Fragments in, turns out.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  v${version} · ${tagline}\n`);
}

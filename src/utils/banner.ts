/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                               Startup Banner                              ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Console banner printed once at startup.
 *
 * @packageDocumentation
 */

const BANNER = `
\x1b[31m╔═══════════════════════════════════════════════╗
║                                               ║
║         🎮  POKÉDEX DATA NODE  🎮             ║
║      PokéAPI datasets · IPFS result cache     ║
║                                               ║
╚═══════════════════════════════════════════════╝\x1b[0m
`

export function displayBanner(): void {
	console.log(BANNER)
}

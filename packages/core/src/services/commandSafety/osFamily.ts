// "win" must stand alone or as windows/win32/win64/winnt so that Darwin is not
// mistaken for Windows.
const WINDOWS_FAMILY = /(^|[^a-z])win(dows|32|64|nt)?([^a-z]|$)/i;

export function isWindowsFamily(osName: string | null | undefined): boolean {
  return typeof osName === 'string' && WINDOWS_FAMILY.test(osName);
}

export function canonicalListingCommand(osName: string | null | undefined): string {
  return isWindowsFamily(osName) ? 'dir' : 'ls -la';
}

/**
 * Next.js server start hook
 */
export async function register(): Promise<void> {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;

  const { installShutdownHooks } = await import('@/lib/analytics/shutdown');
  installShutdownHooks();
}

export function reportFailure(error: unknown, verbose: boolean | undefined): void {
  if (error instanceof Error) {
    console.error(`❌ Error: ${error.message}`);
    if (verbose && error.stack) {
      console.error(`📋 Stack trace:\n${error.stack}`);
    }
    if (error.cause) {
      console.error(`🔗 Cause: ${String(error.cause)}`);
    }
  } else {
    console.error('❌ Error:', error);
  }
}

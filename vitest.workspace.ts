export default ['./vitest.config.ts', './vitest.integration.config.ts'];

/** Version recorded with every run. Kept in step with package.json. */
export const GEMRADAR_VERSION = '1.0.0';

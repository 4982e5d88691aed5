/**
 * Package version, read from package.json at build time by tsc
 */
import pkg from '../../package.json';

export const BUILD_VERSION: string = pkg.version;

export * from './config.js';
export * from './distro.js';
export * from './fs.js';
export * from './glob.js';
export * from './home.js';
export * from './paths.js';
export * from './size.js';

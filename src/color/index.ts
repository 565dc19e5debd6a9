export { ColorResolver, resolveColor } from './ColorResolver.js';

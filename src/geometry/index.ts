export { circlePolygon, lineBand } from './ShapeGeometry.js';

export { StandardNormal } from './StandardNormal';

export { ParameterValidator } from './ParameterValidator';

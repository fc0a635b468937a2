export { AppNameResolver } from './app_name_resolver';

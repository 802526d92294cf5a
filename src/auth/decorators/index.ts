export * from './public.decorator';
export * from './require-scope.decorator';
export * from './resource-scoped.decorator';
export * from './current-identity.decorator';

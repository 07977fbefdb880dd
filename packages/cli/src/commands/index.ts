export * from './context';
export * from './exportSitePlugins';
export * from './setSiteModuleStatus';
export * from './listSites';
export * from './listSiteModules';

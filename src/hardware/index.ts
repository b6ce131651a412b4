export * from './ph-sensor';

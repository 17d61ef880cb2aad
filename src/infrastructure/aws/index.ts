export { createEksTokenResolver } from './eks-token';
export type { CredentialResolver, EksTokenResolverOptions } from './eks-token';
export { createEksDescriber, loadClusterConnection } from './cluster-connection';
export type { ClusterDescriber, DescribedCluster } from './cluster-connection';

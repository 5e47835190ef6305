/**
 * API groups and versions of the cluster-management control plane
 */

export const POLICY_API_GROUP = 'policy.open-cluster-management.io';
export const CLUSTER_API_GROUP = 'cluster.open-cluster-management.io';

export const POLICY_API_VERSION = `${POLICY_API_GROUP}/v1`;
export const CONFIGURATION_POLICY_API_VERSION = `${POLICY_API_GROUP}/v1`;
export const PLACEMENT_BINDING_API_VERSION = `${POLICY_API_GROUP}/v1`;
export const POLICY_GENERATOR_API_VERSION = `${POLICY_API_GROUP}/v1`;
export const PLACEMENT_API_VERSION = `${CLUSTER_API_GROUP}/v1beta1`;
export const MANAGED_CLUSTER_SET_BINDING_API_VERSION = `${CLUSTER_API_GROUP}/v1beta2`;

/** Severity written on every ConfigurationPolicy */
export const CONFIGURATION_POLICY_SEVERITY = 'low';

/** Compliance type written on every object template */
export const OBJECT_TEMPLATE_COMPLIANCE_TYPE = 'musthave';

export const DEFAULT_NAMESPACE = 'policies';

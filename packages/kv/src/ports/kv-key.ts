/**
 * A flat key in the store, e.g. "/jupyterhub/routes/_2Fuser_2F".
 *
 * @remarks
 * Hierarchy is expressed only by a separator inside the string; stores do not
 * interpret it beyond prefix matching.
 */
export type KvKey = string

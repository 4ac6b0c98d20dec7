export { generateNs3Program, toNs3TimeValue } from "./ns3/Ns3ProgramGenerator";
export type { Ns3ProgramOptions } from "./ns3/Ns3ProgramGenerator";
export { buildMeshConfig, renderMeshConfig, generateMeshConfig } from "./mesh/MeshConfigGenerator";
export type { MeshConfig, MeshConfigOptions, MeshLinkConfig, MeshNodeConfig } from "./mesh/MeshConfigGenerator";
export { generateDot, edgeLabel, escapeDot } from "./dot/DotGenerator";
export type { DotOptions } from "./dot/DotGenerator";

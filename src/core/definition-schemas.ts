/*
Zod schemas for the ECS documents deckhand reads from disk.
Field names and enums follow the ECS API, so parsed values are the SDK's own input types.
Task definitions and overrides are strict; service definitions keep only the fields RunTask shares.
*/

import {
  ApplicationProtocol,
  AssignPublicIp,
  Compatibility,
  ContainerCondition,
  CPUArchitecture,
  DeviceCgroupPermission,
  EFSAuthorizationConfigIAM,
  EFSTransitEncryption,
  EnvironmentFileType,
  FirelensConfigurationType,
  IpcMode,
  LaunchType,
  LogDriver,
  NetworkMode,
  OSFamily,
  PidMode,
  PlacementConstraintType,
  PlacementStrategyType,
  ProxyConfigurationType,
  ResourceType,
  Scope,
  TaskDefinitionPlacementConstraintType,
  TransportProtocol,
  UlimitName,
} from "@aws-sdk/client-ecs";
import { z } from "zod";

// =============================================================================
// SHARED
// =============================================================================

const StringMapSchema = z.record(z.string());

const KeyValuePairSchema = z.object({ name: z.string().optional(), value: z.string().optional() }).strict();

const EnvironmentFileSchema = z
  .object({ value: z.string(), type: z.nativeEnum(EnvironmentFileType) })
  .strict();

const ResourceRequirementSchema = z
  .object({ value: z.string(), type: z.nativeEnum(ResourceType) })
  .strict();

const EphemeralStorageSchema = z.object({ sizeInGiB: z.number().int() }).strict();

const SecretSchema = z.object({ name: z.string(), valueFrom: z.string() }).strict();

// =============================================================================
// CONTAINER DEFINITIONS
// =============================================================================

const PortMappingSchema = z
  .object({
    containerPort: z.number().int().optional(),
    hostPort: z.number().int().optional(),
    protocol: z.nativeEnum(TransportProtocol).optional(),
    name: z.string().optional(),
    appProtocol: z.nativeEnum(ApplicationProtocol).optional(),
    containerPortRange: z.string().optional(),
  })
  .strict();

const LogConfigurationSchema = z
  .object({
    logDriver: z.nativeEnum(LogDriver),
    options: StringMapSchema.optional(),
    secretOptions: z.array(SecretSchema).optional(),
  })
  .strict();

const HealthCheckSchema = z
  .object({
    command: z.array(z.string()),
    interval: z.number().int().optional(),
    timeout: z.number().int().optional(),
    retries: z.number().int().optional(),
    startPeriod: z.number().int().optional(),
  })
  .strict();

const LinuxParametersSchema = z
  .object({
    capabilities: z
      .object({ add: z.array(z.string()).optional(), drop: z.array(z.string()).optional() })
      .strict()
      .optional(),
    devices: z
      .array(
        z
          .object({
            hostPath: z.string(),
            containerPath: z.string().optional(),
            permissions: z.array(z.nativeEnum(DeviceCgroupPermission)).optional(),
          })
          .strict(),
      )
      .optional(),
    initProcessEnabled: z.boolean().optional(),
    sharedMemorySize: z.number().int().optional(),
    tmpfs: z
      .array(
        z
          .object({
            containerPath: z.string(),
            size: z.number().int(),
            mountOptions: z.array(z.string()).optional(),
          })
          .strict(),
      )
      .optional(),
    maxSwap: z.number().int().optional(),
    swappiness: z.number().int().optional(),
  })
  .strict();

const ContainerDefinitionSchema = z
  .object({
    name: z.string().min(1),
    image: z.string().optional(),
    repositoryCredentials: z.object({ credentialsParameter: z.string() }).strict().optional(),
    cpu: z.number().int().optional(),
    memory: z.number().int().optional(),
    memoryReservation: z.number().int().optional(),
    links: z.array(z.string()).optional(),
    portMappings: z.array(PortMappingSchema).optional(),
    essential: z.boolean().optional(),
    entryPoint: z.array(z.string()).optional(),
    command: z.array(z.string()).optional(),
    environment: z.array(KeyValuePairSchema).optional(),
    environmentFiles: z.array(EnvironmentFileSchema).optional(),
    mountPoints: z
      .array(
        z
          .object({
            sourceVolume: z.string().optional(),
            containerPath: z.string().optional(),
            readOnly: z.boolean().optional(),
          })
          .strict(),
      )
      .optional(),
    volumesFrom: z
      .array(
        z
          .object({ sourceContainer: z.string().optional(), readOnly: z.boolean().optional() })
          .strict(),
      )
      .optional(),
    linuxParameters: LinuxParametersSchema.optional(),
    secrets: z.array(SecretSchema).optional(),
    dependsOn: z
      .array(
        z
          .object({ containerName: z.string(), condition: z.nativeEnum(ContainerCondition) })
          .strict(),
      )
      .optional(),
    startTimeout: z.number().int().optional(),
    stopTimeout: z.number().int().optional(),
    hostname: z.string().optional(),
    user: z.string().optional(),
    workingDirectory: z.string().optional(),
    disableNetworking: z.boolean().optional(),
    privileged: z.boolean().optional(),
    readonlyRootFilesystem: z.boolean().optional(),
    dnsServers: z.array(z.string()).optional(),
    dnsSearchDomains: z.array(z.string()).optional(),
    extraHosts: z
      .array(z.object({ hostname: z.string(), ipAddress: z.string() }).strict())
      .optional(),
    dockerSecurityOptions: z.array(z.string()).optional(),
    interactive: z.boolean().optional(),
    pseudoTerminal: z.boolean().optional(),
    dockerLabels: StringMapSchema.optional(),
    ulimits: z
      .array(
        z
          .object({
            name: z.nativeEnum(UlimitName),
            softLimit: z.number().int(),
            hardLimit: z.number().int(),
          })
          .strict(),
      )
      .optional(),
    logConfiguration: LogConfigurationSchema.optional(),
    healthCheck: HealthCheckSchema.optional(),
    systemControls: z
      .array(
        z.object({ namespace: z.string().optional(), value: z.string().optional() }).strict(),
      )
      .optional(),
    resourceRequirements: z.array(ResourceRequirementSchema).optional(),
    firelensConfiguration: z
      .object({
        type: z.nativeEnum(FirelensConfigurationType),
        options: StringMapSchema.optional(),
      })
      .strict()
      .optional(),
    credentialSpecs: z.array(z.string()).optional(),
  })
  .strict();

// =============================================================================
// VOLUMES
// =============================================================================

const VolumeSchema = z
  .object({
    name: z.string().optional(),
    host: z.object({ sourcePath: z.string().optional() }).strict().optional(),
    dockerVolumeConfiguration: z
      .object({
        scope: z.nativeEnum(Scope).optional(),
        autoprovision: z.boolean().optional(),
        driver: z.string().optional(),
        driverOpts: StringMapSchema.optional(),
        labels: StringMapSchema.optional(),
      })
      .strict()
      .optional(),
    efsVolumeConfiguration: z
      .object({
        fileSystemId: z.string(),
        rootDirectory: z.string().optional(),
        transitEncryption: z.nativeEnum(EFSTransitEncryption).optional(),
        transitEncryptionPort: z.number().int().optional(),
        authorizationConfig: z
          .object({
            accessPointId: z.string().optional(),
            iam: z.nativeEnum(EFSAuthorizationConfigIAM).optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    fsxWindowsFileServerVolumeConfiguration: z
      .object({
        fileSystemId: z.string(),
        rootDirectory: z.string(),
        authorizationConfig: z
          .object({ credentialsParameter: z.string(), domain: z.string() })
          .strict(),
      })
      .strict()
      .optional(),
  })
  .strict();

// =============================================================================
// DOCUMENTS
// =============================================================================

export const TaskDefinitionSchema = z
  .object({
    family: z.string().min(1),
    taskRoleArn: z.string().optional(),
    executionRoleArn: z.string().optional(),
    networkMode: z.nativeEnum(NetworkMode).optional(),
    containerDefinitions: z.array(ContainerDefinitionSchema).min(1),
    volumes: z.array(VolumeSchema).optional(),
    placementConstraints: z
      .array(
        z
          .object({
            type: z.nativeEnum(TaskDefinitionPlacementConstraintType).optional(),
            expression: z.string().optional(),
          })
          .strict(),
      )
      .optional(),
    requiresCompatibilities: z.array(z.nativeEnum(Compatibility)).optional(),
    cpu: z.string().optional(),
    memory: z.string().optional(),
    tags: z
      .array(z.object({ key: z.string().optional(), value: z.string().optional() }).strict())
      .optional(),
    pidMode: z.nativeEnum(PidMode).optional(),
    ipcMode: z.nativeEnum(IpcMode).optional(),
    proxyConfiguration: z
      .object({
        type: z.nativeEnum(ProxyConfigurationType).optional(),
        containerName: z.string(),
        properties: z.array(KeyValuePairSchema).optional(),
      })
      .strict()
      .optional(),
    inferenceAccelerators: z
      .array(z.object({ deviceName: z.string(), deviceType: z.string() }).strict())
      .optional(),
    ephemeralStorage: EphemeralStorageSchema.optional(),
    runtimePlatform: z
      .object({
        cpuArchitecture: z.nativeEnum(CPUArchitecture).optional(),
        operatingSystemFamily: z.nativeEnum(OSFamily).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Other service keys (desiredCount, loadBalancers, ...) are dropped. */
export const ServiceDefinitionSchema = z.object({
  launchType: z.nativeEnum(LaunchType).optional(),
  networkConfiguration: z
    .object({
      awsvpcConfiguration: z
        .object({
          subnets: z.array(z.string()),
          securityGroups: z.array(z.string()).optional(),
          assignPublicIp: z.nativeEnum(AssignPublicIp).optional(),
        })
        .optional(),
    })
    .optional(),
  capacityProviderStrategy: z
    .array(
      z.object({
        capacityProvider: z.string(),
        weight: z.number().int().optional(),
        base: z.number().int().optional(),
      }),
    )
    .optional(),
  placementConstraints: z
    .array(
      z.object({
        type: z.nativeEnum(PlacementConstraintType).optional(),
        expression: z.string().optional(),
      }),
    )
    .optional(),
  placementStrategy: z
    .array(
      z.object({
        type: z.nativeEnum(PlacementStrategyType).optional(),
        field: z.string().optional(),
      }),
    )
    .optional(),
  platformVersion: z.string().optional(),
  enableECSManagedTags: z.boolean().optional(),
  enableExecuteCommand: z.boolean().optional(),
});

export const TaskOverrideSchema = z
  .object({
    containerOverrides: z
      .array(
        z
          .object({
            name: z.string().optional(),
            command: z.array(z.string()).optional(),
            environment: z.array(KeyValuePairSchema).optional(),
            environmentFiles: z.array(EnvironmentFileSchema).optional(),
            cpu: z.number().int().optional(),
            memory: z.number().int().optional(),
            memoryReservation: z.number().int().optional(),
            resourceRequirements: z.array(ResourceRequirementSchema).optional(),
          })
          .strict(),
      )
      .optional(),
    cpu: z.string().optional(),
    inferenceAcceleratorOverrides: z
      .array(
        z.object({ deviceName: z.string().optional(), deviceType: z.string().optional() }).strict(),
      )
      .optional(),
    executionRoleArn: z.string().optional(),
    memory: z.string().optional(),
    taskRoleArn: z.string().optional(),
    ephemeralStorage: EphemeralStorageSchema.optional(),
  })
  .strict();

import { z } from 'zod';

// Subsets of Docker Engine API payloads that the app reads.

const labels = z.record(z.string()).nullish().transform((v) => v ?? {});
const strings = z.array(z.string()).nullish().transform((v) => v ?? []);

export const containerSummarySchema = z.object({
  Id: z.string(),
  Names: strings,
  Image: z.string().default(''),
  State: z.string().default(''),
  Status: z.string().default(''),
  Created: z.number().default(0),
  Ports: z.array(z.object({
    IP: z.string().optional(),
    PrivatePort: z.number(),
    PublicPort: z.number().optional(),
    Type: z.string().default('tcp'),
  })).nullish().transform((v) => v ?? []),
  Labels: labels,
  NetworkSettings: z.object({
    Networks: z.record(z.object({ NetworkID: z.string().default('') })).nullish(),
  }).nullish(),
  Mounts: z.array(z.object({ Type: z.string().optional(), Name: z.string().optional() })).nullish(),
});

export const containerListSchema = z.array(containerSummarySchema);
export type ContainerSummary = z.infer<typeof containerSummarySchema>;

export const containerInspectSchema = z.object({
  Id: z.string(),
  Name: z.string().default(''),
  State: z.object({ Status: z.string().default('') }).default({}),
  Config: z.object({
    Image: z.string().default(''),
    Env: strings,
    Cmd: z.array(z.string()).nullish(),
    Entrypoint: z.array(z.string()).nullish(),
    WorkingDir: z.string().nullish(),
    User: z.string().nullish(),
    Tty: z.boolean().default(false),
    OpenStdin: z.boolean().default(false),
    Labels: labels,
  }),
  HostConfig: z.object({
    Binds: strings,
    PortBindings: z.record(
      z.array(z.object({ HostIp: z.string().default(''), HostPort: z.string().default('') })).nullish(),
    ).nullish(),
    NetworkMode: z.string().default(''),
    Privileged: z.boolean().default(false),
    CapAdd: strings,
    CapDrop: strings,
    RestartPolicy: z.object({
      Name: z.string().default(''),
      MaximumRetryCount: z.number().default(0),
    }).default({}),
  }).default({}),
  NetworkSettings: z.object({
    Networks: z.record(z.object({
      NetworkID: z.string().default(''),
      Aliases: z.array(z.string()).nullish(),
    })).nullish(),
  }).default({}),
});

export type ContainerInspect = z.infer<typeof containerInspectSchema>;

export const createResponseSchema = z.object({
  Id: z.string(),
  Warnings: z.array(z.string()).nullish(),
});

export const imageListSchema = z.array(z.object({
  Id: z.string(),
  RepoTags: strings,
  Size: z.number().default(0),
  Created: z.number().default(0),
  Containers: z.number().default(-1),
}));

export const networkListSchema = z.array(z.object({
  Id: z.string(),
  Name: z.string(),
  Driver: z.string().default(''),
  Scope: z.string().default(''),
  Internal: z.boolean().default(false),
  Created: z.string().default(''),
}));

export const networkCreateSchema = z.object({
  Id: z.string(),
});

export const volumeListSchema = z.object({
  Volumes: z.array(z.object({
    Name: z.string(),
    Driver: z.string().default(''),
    Mountpoint: z.string().default(''),
    CreatedAt: z.string().default(''),
    Scope: z.string().default(''),
  })).nullish().transform((v) => v ?? []),
});

export const volumePruneSchema = z.object({
  VolumesDeleted: strings,
  SpaceReclaimed: z.number().default(0),
});

// One line of the image pull progress stream
export const pullProgressSchema = z.object({
  status: z.string().optional(),
  error: z.string().optional(),
  errorDetail: z.object({ message: z.string().optional() }).optional(),
}).passthrough();

import type { IInstanceLifecycleService } from "./instance-lifecycle-service";
import type { IInstanceProfileService } from "./instance-profile-service";
import type { IRemoteCommandService } from "./remote-command-service";

/** Collaborators a runner mode may call */
export interface RunnerServices {
  instances: IInstanceLifecycleService;
  profiles: IInstanceProfileService;
  commands: IRemoteCommandService;
}

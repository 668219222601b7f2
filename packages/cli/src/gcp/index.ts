/**
 * Firebase and GCP utilities for hcg-setup
 */

export {
  isFirebaseInstalled,
  checkFirebaseAuth,
  loginToFirebase,
  createProjectCommand,
  createAppCommand,
  sdkConfigCommand,
  createFirebaseProject,
  createFirebaseApp,
  downloadSdkConfig,
  describeFirebaseFailure,
  getFirebaseConsoleUrl,
  isValidProjectId,
  type FirebasePlatform,
} from './firebase';

export {
  isGcloudInstalled,
  addIamPolicyBindingCommand,
  grantIamRole,
  getIamConsoleUrl,
} from './iam';

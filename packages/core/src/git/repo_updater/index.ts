export { RepoUpdater, GIT_AUTH_USERNAME, buildAuthArgs } from './repo_updater';

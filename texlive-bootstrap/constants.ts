// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export const cli = 'texlive-bootstrap';
export const latestVersion = 'latest';
export const firstArchivedYear = 2008;

export const defaultMirror = 'https://mirror.ctan.org/systems/texlive/tlnet';
export const defaultArchiveMirror = 'https://ftp.tug.org/historic/systems/texlive';
/** `{year}` is replaced with the requested release year */
export const archiveRepositoryTemplate = '{year}/tlnet-final';
export const defaultArchiveName = 'install-tl-unx.tar.gz';
export const defaultCacheBuster = '0';

export const defaultProfile = 'texlive.profile';
export const installerDirectory = 'install-tl';
export const installerName = 'install-tl';
export const installerInterpreter = 'perl';

export const entryPoint = 'tex';
export const versionArgument = '--version';
export const pathHelper = 'tlmgr';

export const knownInstallRoots = ['/usr/local/texlive', '/opt/texlive'];
export const homeInstallRoots = ['texlive', '.texlive'];
export const linkDirectory = '/usr/local/bin';

export const searchRoot = '/';
export const searchDepth = 7;
export const searchBudget = 200000;
export const searchExcludes = ['/proc', '/sys', '/dev'];

export const downloadAttempts = 3;
export const retryDelay = 2000;
export const requestTimeout = 60000;

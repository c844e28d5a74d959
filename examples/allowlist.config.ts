import { makeAllowList } from '../src/index.js'

const coreFunctions = ['absdiff', 'add', 'inRange', 'minMaxLoc']

const core = {
  '': [...coreFunctions, 'createCLAHE'],
  Algorithm: [],
}

const imgproc = {
  '': ['cvtColor', 'GaussianBlur'],
  CLAHE: ['apply', 'getClipLimit', 'setClipLimit'],
}

const features2d = {
  Feature2D: ['detect', 'compute'],
  ORB: ['create', 'setMaxFeatures'],
}

export const namespacePrefixOverride = {
  dnn: '',
}

export default makeAllowList([core, imgproc, features2d])

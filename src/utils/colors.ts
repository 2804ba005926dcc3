export { blue, cyan, dim, gray, green, red, yellow } from 'yoctocolors'

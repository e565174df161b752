/* eslint-disable no-console */
import chalk from 'chalk';

let debugMode = false;

export function setDebugMode(enabled:boolean):void {
  debugMode = enabled;
}

function currentDT():string {
  const date = new Date();
  let month = (date.getMonth() + 1).toString();
  if (month.length == 1) {month = '0' + month;}
  let day = date.getDate().toString();
  if (day.length == 1) {day = '0' + day;}
  let hour = date.getHours().toString();
  if (hour.length == 1) {hour = '0' + hour;}
  let minute = date.getMinutes().toString();
  if (minute.length == 1) {minute = '0' + minute;}
  let second = date.getSeconds().toString();
  if (second.length == 1) {second = '0' + second;}
  return `[${date.getFullYear()}-${month}-${day}|${hour}:${minute}:${second}]`;
}

export function log(level:string, args:string[]):void {
  level = level.toUpperCase();
  const logStr = args.join(' ');
  switch (level) {
    case 'INFO':
      console.log(`${chalk.yellow(currentDT())} - ${chalk.bold.blue(level)} - ${logStr}`);
      break;

    case 'FETCH':
      console.log(`${chalk.yellow(currentDT())} - ${chalk.hex('#FF7F00').bold(level)} - ${logStr}`);
      break;

    // warnings and errors go to stderr so stdout stays quiet on a broken run
    case 'WARN':
      console.error(`${chalk.yellow(currentDT())} - ${chalk.bold.yellow(level)} - ${logStr}`);
      break;

    case 'ERROR':
      console.error(`${chalk.yellow(currentDT())} - ${chalk.bold.red(level)} - ${logStr}`);
      break;

    default:
      console.log(`${chalk.yellow(currentDT())} - ${chalk.bold.magenta(level)} - ${logStr}`);
      break;
  }
}

export function logDebug(...message:Array<string | number>):void {
  if (debugMode) {
    console.log(`${chalk.yellow(currentDT())} - ${chalk.bold.yellow('DEBUG')} - ${message.join(' ')}`);
  }
}

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { reportError } from './errors';
import { CommonOptions, UnitOptions, formatOption, withConfigOption, withUnitsOption } from './options';
import { SnapshotStore } from '../clients/SnapshotStore';
import { compareSnapshots } from '../clients/SnapshotManager';
import { ReportFormat, SnapshotReportRenderer } from '../clients/SnapshotReportRenderer';
import { ReportMailer } from '../clients/ReportMailer';
import { Logger } from '../clients/Logger';

interface ReportOptions extends CommonOptions, UnitOptions {
  format: ReportFormat;
  headline?: boolean;
  mail?: boolean;
}

export const reportCommand = withUnitsOption(
  withConfigOption(
    new Command()
      .name('report')
      .description('Compare the two most recent snapshots')
  )
)
  .addOption(formatOption(['text', 'html', 'json']))
  .option('--headline', 'Print a one-line summary before the report')
  .option('--mail', 'Send the report as HTML mail instead of printing it')
  .action(async (options: ReportOptions) => {
    try {
      const config = ConfigurationManager.loadConfiguration(process.env, options.config, {
        requireCredentials: false,
      });
      const { current, previous } = await new SnapshotStore(config.snapshotDir).latest();
      const comparison = compareSnapshots(current, previous);
      const renderer = new SnapshotReportRenderer(options.units);

      if (options.mail) {
        const mail = ConfigurationManager.requireMailSettings(config.mail);
        const mailer = new ReportMailer(mail, new Logger(config.logLevel));
        await mailer.send({
          subject: renderer.headline(comparison, mail.subject),
          html: renderer.renderHtml(comparison),
        });
        console.log(chalk.green(`✓ Report sent to ${mail.to}`));
        return;
      }

      if (options.headline) {
        process.stdout.write(`${renderer.headline(comparison)}\n`);
      }
      process.stdout.write(renderer.render(comparison, options.format));
    } catch (error) {
      process.exit(reportError(error));
    }
  });
